#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { run } from './server';
import logger from './utils/logger';

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

export function buildProgram(start: typeof run = run): Command {
  const program = new Command();

  program
    .name('voice-bridge')
    .description('Real-time voice calls between Twilio Media Streams and a voice AI')
    .option('--host <host>', 'Host to bind to (defaults to HOST or 0.0.0.0)')
    .option('--port <port>', 'Port to listen on (defaults to PORT or 8082)', parsePort)
    .action(async (options: { host?: string; port?: number }) => {
      await start({
        ...(options.host !== undefined ? { host: options.host } : {}),
        ...(options.port !== undefined ? { port: options.port } : {}),
      });
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err) => {
      logger.fatal({ err }, 'Failed to start server');
      process.exit(1);
    });
}
