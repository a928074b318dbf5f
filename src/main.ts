/**
 * API STARTUP SCRIPT
 *
 * Loads configuration from the environment, connects PostgreSQL and Redis,
 * and serves the scan API until SIGINT or SIGTERM.
 *
 * Run this with: npm start
 */
import {loadConfigFromEnv} from './effects/config';
import {makeAppEffects} from './effects/EffectsFactory';
import {createServer} from './api/server';

async function main() {
  console.log('🚀 Starting scan API...\n');

  try {
    const config = loadConfigFromEnv();
    const appEffects = await makeAppEffects(config);

    console.log('📋 Configuration:');
    console.log('   - Stores:', config.stores.map(store => store.name).join(', ') || '(none)');
    console.log('   - Recent scan window:', `${config.scan.recencyWindowDays} days`);
    console.log('   - Phone window:', `${config.scan.phoneWindowDays} days`);
    console.log('   - Order cutoff:', `${config.scan.orderCutoffDays} days`);
    console.log('');

    const server = createServer(appEffects, config.scan).listen(config.api.port, () => {
      console.log(`🌐 API server started on port ${config.api.port}`);
      console.log(`   - Scan: POST http://localhost:${config.api.port}/scan`);
      console.log(`   - Scans of a day: GET http://localhost:${config.api.port}/scans?date=YYYY-MM-DD&tag=fast`);
      console.log(`   - Health check: GET http://localhost:${config.api.port}/health`);
      console.log('');
    });

    const shutdown = (signal: string) => {
      console.log(`\n🛑 ${signal} received, shutting down...`);
      server.close();
      appEffects.close()
        .then(() => process.exit(0))
        .catch(error => {
          console.error('❌ Failed to close connections:', error);
          process.exit(1);
        });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    console.error('❌ Failed to start scan API:', error);
    process.exit(1);
  }
}

main().catch(error => {
  console.error('❌ Scan API crashed:', error);
  process.exit(1);
});
