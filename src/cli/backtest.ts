#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { runBacktestCommand, runBotCommand, stopBotCommand, BotCommandOptions } from './commands';
import { AssetHandling } from '../services/BotCoordinator';
import { BOT_STATUSES, BotStatus } from '../services/StrategyRepository';
import { APP_VERSION } from '../version';

const ASSET_HANDLING: readonly AssetHandling[] = ['base_only', 'quote_only', 'ignore'];

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseStatus(value: string): BotStatus {
  const status = BOT_STATUSES.find(candidate => candidate === value);
  if (!status) {
    throw new InvalidArgumentError(`Expected one of ${BOT_STATUSES.join(', ')}.`);
  }
  return status;
}

function parseAssetHandling(value: string): AssetHandling {
  const handling = ASSET_HANDLING.find(candidate => candidate === value);
  if (!handling) {
    throw new InvalidArgumentError(`Expected one of ${ASSET_HANDLING.join(', ')}.`);
  }
  return handling;
}

function fail(error: unknown): void {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
}

const program = new Command();

program
  .name('candle-replay')
  .description('Replay candle series through trading strategies')
  .version(APP_VERSION);

program
  .command('backtest')
  .description('Backtest the RSI strategy on a JSON file of candles')
  .requiredOption('-d, --data <file>', 'JSON array of candle records')
  .option('-b, --base <symbol>', 'Base asset symbol', 'BTC')
  .option('-q, --quote <amount>', 'Starting quote balance', parseNumber, 1000)
  .option('--lower <rsi>', 'RSI buy threshold', parseNumber, 30)
  .option('--higher <rsi>', 'RSI sell threshold', parseNumber, 70)
  .option('--period <n>', 'RSI period', parseNumber, 14)
  .option('--window <minutes>', 'Analysis window in minutes', parseNumber, 60 * 24 * 30)
  .option('-c, --config <file>', 'JSON configuration file')
  .option('-o, --output <file>', 'Write the performance rows as JSON')
  .option('--audit <file>', 'Write the audit journal as JSON')
  .action(async (options: Parameters<typeof runBacktestCommand>[0]) => {
    try {
      await runBacktestCommand(options, line => console.log(line));
    } catch (error) {
      fail(error);
    }
  });

function botCommand(name: string, description: string): Command {
  return program
    .command(name)
    .description(description)
    .requiredOption('-p, --person <id>', 'Owner of the bot')
    .requiredOption('-e, --exchange <name>', 'Exchange the bot trades on ("backtest" for simulated)')
    .requiredOption('--bot <id>', 'Bot id')
    .option('-s, --status <status>', 'Current bot status', parseStatus, 'active')
    .option('-d, --data <file>', 'JSON array of candle records to feed the bot')
    .option('-c, --config <file>', 'JSON configuration file')
    .option('--audit <file>', 'Write the audit journal as JSON');
}

botCommand('run-bot', 'Run one step of a persisted bot')
  .action(async (options: BotCommandOptions) => {
    try {
      await runBotCommand(options, line => console.log(line));
    } catch (error) {
      fail(error);
    }
  });

botCommand('stop-bot', 'Cancel open orders, settle holdings and stop a persisted bot')
  .option('-a, --assets <handling>', 'base_only, quote_only or ignore', parseAssetHandling, 'ignore')
  .action(async (options: BotCommandOptions & { assets: AssetHandling }) => {
    try {
      await stopBotCommand(options, line => console.log(line));
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
