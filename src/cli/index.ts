#!/usr/bin/env node

import './env';
import { readFileSync } from 'node:fs';
import chalk from 'chalk';
import { Command } from 'commander';
import { render } from 'ink';
import { createElement } from 'react';
import { z } from 'zod';
import { ChatApiClient } from '@/clients/chat-api.client';
import { ChatApp } from '@/components/terminal/chat-app';
import { toErrorMessage } from '@/lib/errors';
import { ChatSession } from '@/session/chat-session';
import { HistoryLoader } from '@/session/history-loader';
import { configService } from '@/services/config.service';
import { ServerUrlSchema } from '@/services/env-schemas';
import { createLogger, getLogFilePath } from '@/services/logger.service';
import { SessionTransport } from '@/transport/session-transport';
import { type LoginOptions, loginWithPrompts } from './login';
import { PromptCancelledError } from './prompt';

const logger = createLogger('cli');

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
  return PackageJsonSchema.parse(JSON.parse(raw)).version;
}

interface ChatCommandOptions extends LoginOptions {
  server?: string;
}

function resolveServerUrl(option: string | undefined): string {
  if (option === undefined) {
    return configService.getServerUrl();
  }
  const parsed = ServerUrlSchema.safeParse(option);
  if (!parsed.success) {
    throw new Error(`invalid server URL "${option}": must be an http:// or https:// address`);
  }
  return parsed.data;
}

// ============================================================================
// chat
// ============================================================================

async function runChat(options: ChatCommandOptions): Promise<void> {
  const serverUrl = resolveServerUrl(options.server);
  console.log(`Attempting to connect to server at ${serverUrl}`);

  const client = new ChatApiClient(serverUrl, { timeoutMs: configService.getHttpTimeoutMs() });
  const { user, token } = await loginWithPrompts(
    client,
    options,
    { input: process.stdin, output: process.stdout },
    (line) => console.log(line)
  );

  const heartbeat = configService.getHeartbeatConfig();
  const transport = new SessionTransport({
    restBaseUrl: client.serverUrl,
    heartbeatIntervalMs: heartbeat.intervalMs,
    heartbeatTimeoutMs: heartbeat.timeoutMs,
    handshakeTimeoutMs: configService.getHttpTimeoutMs(),
  });
  const session = new ChatSession({
    api: client,
    transport,
    loader: new HistoryLoader(client),
    token,
  });

  const app = render(createElement(ChatApp, { session, username: user.username }), {
    exitOnCtrlC: false,
  });
  try {
    session.start();
    await Promise.race([session.exited, app.waitUntilExit()]);
  } finally {
    app.unmount();
    await session.stop();
  }

  console.log('Goodbye!');
}

const program = new Command();

program
  .name('channelterm')
  .description('Terminal client for channel-based chat servers')
  .version(readVersion())
  .option('-u, --username <username>', 'Username to log in with')
  .option('-p, --password <password>', 'Password to log in with')
  .option('-s, --server <url>', 'Chat server base URL (or set CHAT_SERVER_URL env)')
  .action(async (options: ChatCommandOptions) => {
    try {
      await runChat(options);
    } catch (error) {
      if (error instanceof PromptCancelledError) {
        process.exit(130);
      }
      logger.error('Client failed', { error: toErrorMessage(error) });
      console.error(chalk.red(`\n  ✗ ${toErrorMessage(error)}`));
      console.error(chalk.gray(`  Logs: ${getLogFilePath()}`));
      process.exit(1);
    }
  });

// ============================================================================
// Parse and run
// ============================================================================

await program.parseAsync();
