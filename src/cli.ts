#!/usr/bin/env node

import { Command } from '@commander-js/extra-typings';
import { CliHandlers } from './cli/handlers.js';
import { DEFAULT_FETCH_URL } from './cli/handlers.js';
import { resolveClientOptions } from './cli/options.js';
import type { ConnectionFlags } from './cli/options.js';
import { AppError } from './types/index.js';
import { emergencyError } from './utils/emergencyLog.js';
import {
  createChildLogger,
  LogLevel,
  logger as rootLogger,
  setLogLevel,
} from './utils/logger.js';
import { output } from './utils/output.js';
import { getPackageInfo } from './utils/packageInfo.js';

class CliError extends Error {
  public readonly code: string;

  constructor(message: string, code = 'CLI_ERROR') {
    super(message);
    this.name = 'CliError';
    this.code = code;
  }
}

class CommandExecutionError extends CliError {
  public readonly commandName: string;
  public readonly originalError: Error;

  constructor(commandName: string, originalError: Error) {
    super(
      `Failed to ${commandName}: ${originalError.message}`,
      originalError instanceof AppError
        ? originalError.code
        : 'COMMAND_EXECUTION_ERROR'
    );
    this.name = 'CommandExecutionError';
    this.commandName = commandName;
    this.originalError = originalError;
  }
}

const logger = createChildLogger('cli');

let isShuttingDown = false;

const shutdown = (signal: string): void => {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  logger.info(`Received ${signal}, shutting down...`);
  rootLogger.end();
  // Allow time for the logger to flush before exit
  setTimeout(() => process.exit(130), 100);
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

process.on('unhandledRejection', (reason) => {
  emergencyError('Unhandled promise rejection', reason);
  process.exitCode = 1;
});

interface CommonFlags extends ConnectionFlags {
  json?: true | undefined;
  verbose?: true | undefined;
}

/**
 * Wrapper for CLI commands: resolves connection settings, runs the handler,
 * and maps failures onto a logged message and exit status 1
 */
async function executeCommand(
  commandName: string,
  flags: CommonFlags,
  handler: (handlers: CliHandlers) => Promise<void>
): Promise<void> {
  try {
    if (flags.verbose) {
      setLogLevel(LogLevel.DEBUG);
      logger.debug('Verbose logging enabled');
    }
    if (flags.json) {
      output.setFormat('json');
    }
    const options = await resolveClientOptions(flags);
    logger.debug(`Using proxy at ${options.baseUrl}`);

    await handler(new CliHandlers(options, output));
    process.exitCode = 0;
  } catch (error) {
    const cliError = new CommandExecutionError(
      commandName,
      error instanceof Error ? error : new Error(String(error))
    );

    output.writeErrorMessage(cliError.message);
    logger.debug('Command failed', { code: cliError.code });
    if (cliError.originalError.stack) {
      logger.debug('Stack trace:', { stack: cliError.originalError.stack });
    }
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name('mcp-proxy-client')
  .description('Exercise an MCP OIDC proxy over HTTP and server-sent events')
  .version(getPackageInfo().version)
  .addHelpText(
    'after',
    `
Examples:
  mcp-proxy-client session --fetch https://example.com
  mcp-proxy-client message --base-url http://localhost:8090
  mcp-proxy-client listen --until message

Environment Variables:
  MCP_PROXY_CLIENT_BASE_URL        - Proxy base URL (default: http://localhost:8090)
  MCP_PROXY_CLIENT_TOKEN           - Bearer token sent as Authorization header
  MCP_PROXY_CLIENT_SESSION_COOKIE  - Proxy session_id cookie from a browser login
  MCP_PROXY_CLIENT_CONFIG          - Path to a YAML connection profile

Logging Variables:
  MCP_PROXY_CLIENT_LOG_LEVEL       - Log level: error, warn, info, debug (default: info)
  MCP_PROXY_CLIENT_LOG_TARGET      - Log target: console, file, both (default: console)
  MCP_PROXY_CLIENT_LOG_DIR         - Log directory for the file target (default: ./.logs)`
  );

program
  .command('session')
  .description(
    'Create a session, initialize, list tools and call the fetch tool'
  )
  .option('--fetch <url>', 'URL passed to the fetch tool', DEFAULT_FETCH_URL)
  .option('-u, --base-url <url>', 'Proxy base URL')
  .option('-t, --token <token>', 'Bearer token')
  .option('--cookie <value>', 'Proxy session_id cookie value')
  .option('-c, --config <file>', 'YAML connection profile')
  .option('--json', 'Print results as JSON')
  .option('-v, --verbose', 'Enable verbose (debug) logging')
  .action(async (options): Promise<void> => {
    await executeCommand('run session workflow', options, (handlers) =>
      handlers.runSession(options.fetch)
    );
  });

program
  .command('tools')
  .description('Create a session and list the tools the server exposes')
  .option('-u, --base-url <url>', 'Proxy base URL')
  .option('-t, --token <token>', 'Bearer token')
  .option('--cookie <value>', 'Proxy session_id cookie value')
  .option('-c, --config <file>', 'YAML connection profile')
  .option('--json', 'Print results as JSON')
  .option('-v, --verbose', 'Enable verbose (debug) logging')
  .action(async (options): Promise<void> => {
    await executeCommand('list tools', options, (handlers) =>
      handlers.listTools()
    );
  });

program
  .command('message')
  .description(
    'Obtain a session from the stream endpoint and send initialize to it'
  )
  .option('-u, --base-url <url>', 'Proxy base URL')
  .option('-t, --token <token>', 'Bearer token')
  .option('--cookie <value>', 'Proxy session_id cookie value')
  .option('-c, --config <file>', 'YAML connection profile')
  .option('--json', 'Print results as JSON')
  .option('-v, --verbose', 'Enable verbose (debug) logging')
  .action(async (options): Promise<void> => {
    await executeCommand('send message', options, (handlers) =>
      handlers.sendInitialize()
    );
  });

program
  .command('listen')
  .description('Print server-sent events until the first one with a given name')
  .option('--until <event>', 'Event name that ends listening', 'message')
  .option('-u, --base-url <url>', 'Proxy base URL')
  .option('-t, --token <token>', 'Bearer token')
  .option('--cookie <value>', 'Proxy session_id cookie value')
  .option('-c, --config <file>', 'YAML connection profile')
  .option('--json', 'Print events as JSON lines')
  .option('-v, --verbose', 'Enable verbose (debug) logging')
  .action(async (options): Promise<void> => {
    await executeCommand('listen for events', options, async (handlers) => {
      const count = await handlers.listen(options.until);
      logger.debug(`Received ${count} events`);
    });
  });

program
  .command('health')
  .description('Show the proxy health check')
  .option('-u, --base-url <url>', 'Proxy base URL')
  .option('-t, --token <token>', 'Bearer token')
  .option('--cookie <value>', 'Proxy session_id cookie value')
  .option('-c, --config <file>', 'YAML connection profile')
  .option('--json', 'Print results as JSON')
  .option('-v, --verbose', 'Enable verbose (debug) logging')
  .action(async (options): Promise<void> => {
    await executeCommand('check health', options, (handlers) =>
      handlers.health()
    );
  });

program
  .command('version')
  .description('Show the proxy build information')
  .option('-u, --base-url <url>', 'Proxy base URL')
  .option('-t, --token <token>', 'Bearer token')
  .option('--cookie <value>', 'Proxy session_id cookie value')
  .option('-c, --config <file>', 'YAML connection profile')
  .option('--json', 'Print results as JSON')
  .option('-v, --verbose', 'Enable verbose (debug) logging')
  .action(async (options): Promise<void> => {
    await executeCommand('get version', options, (handlers) =>
      handlers.version()
    );
  });

program.exitOverride((err) => {
  if (err.exitCode === 0) {
    process.exit(0);
  } else {
    if (err.message !== '(outputHelp)') {
      logger.error(err.message);
    }
    process.exit(err.exitCode);
  }
});

program.parseAsync().catch((error: unknown) => {
  emergencyError('CLI failed', error);
  process.exitCode = 1;
});
