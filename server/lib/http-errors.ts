import type { Response } from 'express';
import { isWorldError, type WorldErrorCode } from '../../engine/index.js';

const STATUS: Record<WorldErrorCode, number> = {
  AlreadyInitialized: 409,
  AlreadyEntangled: 409,
  AlreadyCollapsed: 409,
  NotInitialized: 404,
  CooldownNotElapsed: 429,
  InvalidAwarenessLevel: 400,
  InvalidPriority: 400,
  InvalidEntanglementFactor: 400,
  InvalidCharacterId: 400,
  SelfEntanglement: 400,
  EmptyMeme: 400,
  InvalidCaller: 400,
};

/** Map an operation failure to a response. Unknown errors are 500s. */
export function sendError(res: Response, error: unknown, label: string): void {
  if (isWorldError(error)) {
    res.status(STATUS[error.code]).json({ error: error.message, code: error.code });
    return;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  console.error(`${label} error:`, err.message);
  res.status(500).json({ error: err.message });
}
