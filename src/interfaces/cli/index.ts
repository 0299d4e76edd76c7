#!/usr/bin/env node

/**
 * Parley CLI Entry Point
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { randomUUID } from 'crypto';
import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { ConfigManager, loadSettings } from '../../core/config.js';
import { AgentOrchestrator, createOrchestrator } from '../../core/orchestrator.js';
import { ThreadKey, formatThreadKey, makeThreadKey } from '../../core/types/conversation.js';
import { ModelInvocationError, errorMessage } from '../../utils/errors.js';
import { logger, LogLevel } from '../../utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readPackageVersion(): string {
  let dir = __dirname;
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return '0.0.0';
    }
    dir = parent;
  }
}

/**
 * `KEY=VALUE`; an empty value is filled from the environment at connect time.
 */
function parseEnvPair(pair: string, previous: Record<string, string> = {}): Record<string, string> {
  const separator = pair.indexOf('=');
  if (separator <= 0) {
    throw new Error(`Invalid env entry '${pair}', expected KEY=VALUE`);
  }
  return { ...previous, [pair.slice(0, separator)]: pair.slice(separator + 1) };
}

interface AskOptions {
  chat: string;
  replyTo?: string;
  debug?: boolean;
}

interface AddProviderOptions {
  env: Record<string, string>;
  disabled?: boolean;
}

const program = new Command();

program
  .name('parley')
  .description('Conversational agent with thread memory, MCP tools and web content condensation')
  .version(readPackageVersion());

program
  .command('ask')
  .description('Run one conversational turn')
  .argument('<text...>', 'Message text')
  .option('-c, --chat <id>', 'Chat identifier', 'cli')
  .option('-r, --reply-to <messageId>', 'Reply id printed by a previous turn, to continue that thread')
  .option('--debug', 'Enable debug mode')
  .action(async (textParts: string[], options: AskOptions) => {
    const controller = new AbortController();
    const onSignal = () => {
      console.log(chalk.yellow('\nCancelling...'));
      controller.abort();
    };
    process.once('SIGINT', onSignal);
    let orchestrator: AgentOrchestrator | undefined;

    try {
      const settings = loadSettings();
      logger.setLogLevel(options.debug ? LogLevel.DEBUG : settings.logLevel);

      const configManager = ConfigManager.getInstance();
      orchestrator = createOrchestrator(settings, {
        providers: () => configManager.getProviderSpecs(),
      });

      const thread = options.replyTo ? makeThreadKey(options.replyTo, options.chat) : undefined;
      const replyKey: ThreadKey = makeThreadKey(randomUUID().slice(0, 8), options.chat);

      const result = await orchestrator.handleTurn(
        {
          thread,
          text: textParts.join(' '),
          deliver: output => {
            console.log('\n' + chalk.bold(output.title ?? '') + '\n');
            console.log(output.content + '\n');
            return replyKey;
          },
        },
        controller.signal
      );

      if (result.toolProviders.length > 0) {
        logger.info(`Tool providers: ${result.toolProviders.join(', ')}`);
      }
      if (result.persistedKey) {
        console.log(chalk.gray(`Reply id: ${result.persistedKey.anchorMessageId} (${formatThreadKey(result.persistedKey)})`));
        console.log(chalk.gray(`Continue with: parley ask --chat ${options.chat} --reply-to ${result.persistedKey.anchorMessageId} "..."`));
      }
    } catch (error) {
      if (error instanceof ModelInvocationError) {
        console.log(chalk.red(`✗ The model could not answer after ${error.attempts} attempt(s): ${error.message}`));
      } else {
        logger.error('Turn failed', error);
      }
      process.exitCode = 1;
    } finally {
      process.off('SIGINT', onSignal);
      await orchestrator?.close();
    }
  });

const providers = program.command('providers').description('Manage MCP tool providers');

providers
  .command('list')
  .description('List configured tool providers')
  .action(() => {
    const configManager = ConfigManager.getInstance();
    const entries = Object.entries(configManager.listProviders());
    if (entries.length === 0) {
      console.log(chalk.gray('No tool providers configured.'));
    }
    for (const [name, provider] of entries) {
      const status = provider.enabled ? chalk.green('enabled') : chalk.gray('disabled');
      console.log(`${chalk.cyan(name)} [${status}] ${provider.command} ${provider.args.join(' ')}`);
      for (const key of Object.keys(provider.env)) {
        console.log(chalk.gray(`  env ${key}`));
      }
    }
    console.log(chalk.gray(`\nConfig: ${configManager.getConfigPath()}`));
  });

providers
  .command('add')
  .description('Add or replace a tool provider')
  .argument('<name>', 'Provider name')
  .argument('<command>', 'Command that launches the provider')
  .argument('[args...]', 'Command arguments')
  .option('-e, --env <KEY=VALUE>', 'Environment entry (repeatable)', parseEnvPair, {})
  .option('--disabled', 'Add the provider disabled')
  .action((name: string, command: string, args: string[], options: AddProviderOptions) => {
    try {
      ConfigManager.getInstance().addProvider(name, {
        command,
        args,
        env: options.env,
        enabled: !options.disabled,
      });
      console.log(chalk.green(`✓ Tool provider '${name}' saved`));
    } catch (error) {
      console.log(chalk.red(`✗ ${errorMessage(error)}`));
      process.exitCode = 1;
    }
  });

providers
  .command('remove')
  .description('Remove a tool provider')
  .argument('<name>', 'Provider name')
  .action((name: string) => {
    if (ConfigManager.getInstance().removeProvider(name)) {
      console.log(chalk.green(`✓ Tool provider '${name}' removed`));
    } else {
      console.log(chalk.yellow(`Tool provider '${name}' not found`));
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((error: unknown) => {
  logger.error('Command failed', error);
  process.exitCode = 1;
});
