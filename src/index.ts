import { env } from './config/env.js';
import { logCorsPolicy } from './config/cors.js';
import { buildApp } from './app.js';
import { createEngine } from './engine.js';
import { createStores } from './stores/store-factory.js';

async function main() {
  // 1. Persistence: run migrations before anything touches the tables
  if (env.STORE_MODE === 'postgres') {
    const { runMigrations } = await import('./db/migrate.js');
    await runMigrations();
  } else {
    console.log('[store] STORE_MODE=memory: state is held in process and lost on restart.');
  }

  const stores = await createStores(env.STORE_MODE);
  const engine = createEngine({
    stores,
    maxWindowDays: env.MAX_WINDOW_DAYS,
    defaults: {
      slot_duration_minutes: env.DEFAULT_SLOT_DURATION_MINUTES,
      max_appointments_per_slot: env.DEFAULT_MAX_APPOINTMENTS_PER_SLOT,
      timezone: env.DEFAULT_TIMEZONE,
      min_booking_lead_minutes: env.DEFAULT_MIN_BOOKING_LEAD_MINUTES,
    },
  });

  // Materialise the configuration row so the first request does not race to create it.
  const config = await engine.configuration.get();
  console.log(
    `[configuration] ${config.slot_duration_minutes}-min slots, capacity ${config.max_appointments_per_slot}, ` +
    `${config.timezone}, lead ${config.min_booking_lead_minutes} min`,
  );

  // 2. Event subscribers (notification hooks live outside the engine)
  engine.eventBus.on('BookingConfirmed', (event) => {
    console.log(`[events] BookingConfirmed ${event.appointment.reference_code} at ${event.timestamp}`);
  });
  engine.eventBus.on('BookingCancelled', (event) => {
    console.log(`[events] BookingCancelled ${event.appointment.reference_code} at ${event.timestamp}`);
  });

  // 3. HTTP
  const app = await buildApp({
    engine,
    storeMode: env.STORE_MODE,
    logger: {
      level: env.LOG_LEVEL,
      transport:
        env.NODE_ENV === 'development'
          ? { target: 'pino-pretty', options: { colorize: true } }
          : undefined,
    },
  });
  logCorsPolicy();

  if (env.AUTH_REQUIRED !== 'true') {
    console.warn('[auth] AUTH_REQUIRED=false: admin routes are open. Set AUTH_REQUIRED=true outside development.');
  }

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log(`Server listening on http://${env.HOST}:${env.PORT}`);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`Received ${signal}. Shutting down…`);
    engine.eventBus.removeAllListeners();
    await app.close();
    if (env.STORE_MODE === 'postgres') {
      const { pool } = await import('./db/client.js');
      await pool.end();
    }
    process.exit(0);
  };
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err) => {
  console.error('Fatal startup error:', err);
  process.exit(1);
});
