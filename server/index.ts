import { createWorld, LocalChain } from '../engine/index.js';
import { createApp } from './app.js';

const PORT = process.env.PORT || 3003;
const COOLDOWN_SECONDS = Number(process.env.COOLDOWN_SECONDS || 3600);
const GAS_PRICE_WEI = BigInt(process.env.GAS_PRICE_WEI || '1000000000');

const world = createWorld({
  cooldownSeconds: COOLDOWN_SECONDS,
  context: new LocalChain({ gasPrice: GAS_PRICE_WEI }),
  debug: process.env.NODE_ENV !== 'production',
});

const app = createApp(world);

app.listen(PORT, () => {
  console.log(`Character world running on http://localhost:${PORT}`);
  console.log(`Cooldown: ${COOLDOWN_SECONDS}s, gas price: ${GAS_PRICE_WEI} wei`);
  console.log(`Environment: ${process.env.NODE_ENV || 'development'}`);
});
