// Token counting and truncation for conversation files

import chalk from 'chalk';
import { loadConfig } from '../../utils/config.js';
import { log } from '../../utils/logger.js';
import { ErrorHandler } from '../../utils/error-handler.js';
import { TokenEstimator } from '../../context/token-estimator.js';
import { HistoryTruncator } from '../../context/truncator.js';
import { checkTokenUsage, formatUsageSummary } from '../../context/budget.js';
import { loadConversation } from '../input.js';

export interface TokensCommandOptions {
  model?: string;
  reserve?: number;
  maxTokens?: number;
}

async function setup(options: TokensCommandOptions) {
  const config = await loadConfig();
  return {
    model: options.model ?? config.models.chat,
    reserve: options.reserve ?? config.tokens.reserveTokens,
    estimator: new TokenEstimator({ overhead: config.tokens.overhead }),
  };
}

export async function tokensCountCommand(file: string, options: TokensCommandOptions): Promise<void> {
  try {
    const { model, reserve, estimator } = await setup(options);
    const turns = await loadConversation(file);

    turns.forEach((turn, i) => {
      const tokens = estimator.countTurn(turn, model);
      console.log(`${String(i + 1).padStart(3)}. ${turn.role.padEnd(9)} ${tokens}`);
    });

    const usage = checkTokenUsage(turns, model, {
      reserveTokens: reserve,
      maxTokens: options.maxTokens,
      estimator,
    });
    console.log(chalk.bold(`Total: ${usage.totalTokens} tokens for ${model}`));
    console.log(formatUsageSummary(usage));
  } catch (error) {
    log.error(chalk.red('Error:') + ' ' + ErrorHandler.getErrorMessage(error));
    process.exit(1);
  }
}

export async function tokensTruncateCommand(file: string, options: TokensCommandOptions): Promise<void> {
  try {
    const { model, reserve, estimator } = await setup(options);
    const turns = await loadConversation(file);
    const truncator = new HistoryTruncator(estimator);

    const report = truncator.truncateWithReport(turns, model, reserve, { maxTokens: options.maxTokens });
    if (report.exhausted) {
      log.warn(`Nothing fits: ${report.availableTokens} tokens available for ${model}`);
    } else {
      log.info(
        chalk.gray(
          `Kept ${report.turns.length}/${turns.length} turns, ${report.retainedTokens}/${report.availableTokens} tokens`
        )
      );
    }
    console.log(JSON.stringify(report.turns, null, 2));
  } catch (error) {
    log.error(chalk.red('Error:') + ' ' + ErrorHandler.getErrorMessage(error));
    process.exit(1);
  }
}
