import { createLogger } from './core/Logger';
import { ConfigLoader } from './config';
import { Orchestrator } from './core/Orchestrator';
import { GeoLookupClient } from './client/GeoLookupClient';

const VERSION = '1.0.0';
const logger = createLogger('Main');

async function main(): Promise<void> {
  const configFolder = process.env.CONFIG_FOLDER || './config';

  logger.info(`geolookup v${VERSION} starting...`);
  logger.debug(`Config folder: ${configFolder}`);

  const config = new ConfigLoader(configFolder).load();

  const client = new GeoLookupClient({
    baseUrl: config.lookup.baseUrl,
    token: config.lookup.token,
    timeout: config.lookup.timeout,
  });

  const orchestrator = new Orchestrator(client, {
    display: config.display,
    outputs: config.outputs,
  });

  // Lookup and write failures are reported by the orchestrator; the exit code stays 0
  await orchestrator.run();
}

main().catch((error) => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
