import type { Command } from 'commander';
import { pino } from 'pino';
import { loadConfig } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { createGateway } from '../../gateway/index.js';
import { createApiServer } from '../../api/server.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the OpenAI-compatible HTTP gateway')
    .option('--port <n>', 'Port to listen on (default from config)')
    .option('--host <h>', 'Host to bind to (default from config)')
    .action(async (opts: { port?: string; host?: string }) => {
      const loaded = loadConfig();
      const config = {
        ...loaded,
        api: {
          port: opts.port !== undefined ? parseInt(opts.port, 10) : loaded.api.port,
          host: opts.host ?? loaded.api.host,
        },
      };
      validateConfig(config);

      const logger = pino({ level: config.logLevel });
      if (config.backend.type === 'sagemaker' && !config.backend.endpointName) {
        logger.warn('SAGEMAKER_ENDPOINT_NAME is not set; completion requests will fail until it is');
      }

      const gateway = createGateway(config, logger);
      const app = createApiServer({ gateway, logger });

      await app.listen({ port: config.api.port, host: config.api.host });
    });
}
