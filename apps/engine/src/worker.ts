import 'dotenv/config';
import { closePool, getPool } from '@fleetwatch/adapters';
import { buildEngine, buildPgDeps } from './app.js';
import { loadEnv } from './config/env.js';

/** Runs `task` every `intervalMs`, skipping a tick while the previous run is still going. */
function schedule(name: string, intervalMs: number, task: () => Promise<unknown>): ReturnType<typeof setInterval> {
  let running = false;
  return setInterval(() => {
    if (running) return;
    running = true;
    task()
      .catch((err) => {
        console.error(`[worker] ${name} sweep error`, err);
      })
      .finally(() => {
        running = false;
      });
  }, intervalMs);
}

async function main() {
  const env = loadEnv();

  // Verify DB connection
  await getPool().query('SELECT 1');
  console.log('[worker] database connected');

  const engine = buildEngine(buildPgDeps(), { batchSize: env.SWEEP_BATCH_SIZE });

  const timers = [
    schedule('revalidation', env.REVALIDATION_SWEEP_INTERVAL_MS, () => engine.revalidationSweep.run()),
    schedule('attention', env.ATTENTION_SWEEP_INTERVAL_MS, () => engine.attention.sweep()),
    schedule('stale-vehicle', env.STALE_VEHICLE_SWEEP_INTERVAL_MS, () => engine.staleVehicleSweep.run()),
  ];
  console.log('[worker] sweeps scheduled', {
    revalidationMs: env.REVALIDATION_SWEEP_INTERVAL_MS,
    attentionMs: env.ATTENTION_SWEEP_INTERVAL_MS,
    staleVehicleMs: env.STALE_VEHICLE_SWEEP_INTERVAL_MS,
  });

  const shutdown = async () => {
    console.log('[worker] shutting down...');
    timers.forEach((timer) => clearInterval(timer));
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[worker] shutdown error', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[worker] fatal startup error', err);
  process.exit(1);
});
