// CLI setup with Commander

import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from '../utils/config.js';
import { log, parseLogLevel } from '../utils/logger.js';
import { renderCommand } from './commands/render.js';
import { tokensCountCommand, tokensTruncateCommand } from './commands/tokens.js';
import { modelsCommand } from './commands/models.js';
import { configCommand } from './commands/config.js';
import {
  conversationPrepareCommand,
  conversationRecordCommand,
  conversationResetCommand,
} from './commands/conversation.js';

function parseCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('replyforge')
    .description('Fit chat history into model context windows and render model replies as documents')
    .version('0.1.0')
    .option('--log-level <level>', 'debug, info, warn, error or silent')
    .hook('preAction', async thisCommand => {
      const flag = parseLogLevel(thisCommand.opts<{ logLevel?: string }>().logLevel);
      if (flag !== undefined) {
        log.setLevel(flag);
        return;
      }
      if (!process.env.REPLYFORGE_LOG_LEVEL) {
        const level = parseLogLevel((await loadConfig()).logging.level);
        if (level !== undefined) log.setLevel(level);
      }
    });

  program
    .command('render <input>')
    .description('Render a model reply (JSON document, file or - for stdin) as docx, pdf, xlsx or rtf')
    .option('-f, --format <format>', 'Output format: docx, pdf, xlsx or rtf')
    .option('--detect <text>', 'Pick the format from a user request instead')
    .option('-o, --output <path>', 'Output file (default: derived from the document title)')
    .action(renderCommand);

  const tokens = program.command('tokens').description('Token counting for conversation files');

  tokens
    .command('count <conversation>')
    .description('Count tokens per turn and report usage against the model window')
    .option('-m, --model <name>', 'Model name (default: models.chat from config)')
    .option('-r, --reserve <n>', 'Tokens kept free for the reply', parseCount)
    .option('--max-tokens <n>', 'Use this window instead of the model registry', parseCount)
    .action(tokensCountCommand);

  tokens
    .command('truncate <conversation>')
    .description('Print the turns that fit the model window after the reserve')
    .option('-m, --model <name>', 'Model name (default: models.chat from config)')
    .option('-r, --reserve <n>', 'Tokens kept free for the reply', parseCount)
    .option('--max-tokens <n>', 'Use this window instead of the model registry', parseCount)
    .action(tokensTruncateCommand);

  const conversation = program.command('conversation').description('Stored per-user conversation context');

  conversation
    .command('prepare <user> <message>')
    .description('Print the truncated turns to send for a new user message')
    .option('--mode <mode>', 'Bot mode (chat, image, edit, fileAnalysis)', 'chat')
    .option('-m, --model <name>', 'Model name (default: the model configured for the mode)')
    .option('-r, --reserve <n>', 'Tokens kept free for the reply', parseCount)
    .option('-f, --format <format>', 'Ask for docx, pdf, xlsx or rtf, or none (default: detect)')
    .action(conversationPrepareCommand);

  conversation
    .command('record <user> <userContent> <reply>')
    .description('Store a request and the model reply')
    .option('--mode <mode>', 'Bot mode', 'chat')
    .action(conversationRecordCommand);

  conversation
    .command('reset <user>')
    .description('Forget the stored context')
    .option('--mode <mode>', 'Bot mode', 'chat')
    .action(conversationResetCommand);

  program
    .command('models')
    .description('List known models with their context windows')
    .option('--json', 'Output as JSON')
    .action(modelsCommand);

  program
    .command('config')
    .description('Manage configuration')
    .option('--set <key=value>', 'Set configuration value')
    .option('--get <key>', 'Get configuration value')
    .option('--list', 'List all configuration')
    .action(configCommand);

  return program;
}
