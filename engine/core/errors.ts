export type WorldErrorCode =
  | 'AlreadyInitialized'
  | 'NotInitialized'
  | 'AlreadyEntangled'
  | 'AlreadyCollapsed'
  | 'InvalidAwarenessLevel'
  | 'InvalidPriority'
  | 'CooldownNotElapsed'
  | 'InvalidEntanglementFactor'
  | 'InvalidCharacterId'
  | 'SelfEntanglement'
  | 'EmptyMeme'
  | 'InvalidCaller';

/** A precondition violation. Aborts the operation; nothing it wrote survives. */
export class WorldError extends Error {
  readonly code: WorldErrorCode;

  constructor(code: WorldErrorCode, message: string) {
    super(message);
    this.name = 'WorldError';
    this.code = code;
  }
}

export function isWorldError(err: unknown): err is WorldError {
  return err instanceof WorldError;
}

export function assertCharacterId(id: number): void {
  if (!Number.isSafeInteger(id) || id < 0) {
    throw new WorldError('InvalidCharacterId', `Invalid character ID: ${id}`);
  }
}
