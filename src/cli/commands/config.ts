// Configuration management command

import chalk from 'chalk';
import { loadConfig, setConfigValue, getConfigValue } from '../../utils/config.js';
import { getReplyforgeHomeDir } from '../../utils/app-paths.js';
import { log } from '../../utils/logger.js';

export async function configCommand(options: { set?: string; get?: string; list?: boolean }): Promise<void> {
  try {
    if (options.list) {
      const config = await loadConfig();
      log.info(chalk.bold(`\nConfiguration (${getReplyforgeHomeDir()}):`));
      console.log(JSON.stringify(config, null, 2));
      return;
    }

    if (options.get) {
      const value = await getConfigValue(options.get);
      if (value !== undefined) {
        console.log(typeof value === 'object' ? JSON.stringify(value, null, 2) : String(value));
      } else {
        log.info(chalk.yellow(`Key not found: ${options.get}`));
      }
      return;
    }

    if (options.set) {
      const eqIndex = options.set.indexOf('=');
      if (eqIndex === -1) {
        log.info(chalk.red('Invalid format. Use: --set key=value'));
        process.exit(1);
      }

      const key = options.set.slice(0, eqIndex);
      const value = options.set.slice(eqIndex + 1);

      await setConfigValue(key, value);
      log.info(chalk.green(`✓ Set ${key} = ${value}`));
      return;
    }

    log.info(chalk.yellow('Use --set, --get, or --list'));
    log.info(chalk.gray('Examples:'));
    log.info(chalk.gray('  replyforge config --list'));
    log.info(chalk.gray('  replyforge config --get tokens.reserveTokens'));
    log.info(chalk.gray('  replyforge config --set models.chat=gpt-4o'));
  } catch (error) {
    log.error(chalk.red('Error:') + ' ' + (error instanceof Error ? error.message : String(error)));
    process.exit(1);
  }
}
