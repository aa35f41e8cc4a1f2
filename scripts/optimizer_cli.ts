#!/usr/bin/env node
/**
 * Metrics Optimizer CLI
 * Runs the optimization loop for a bounded period and reports status and analytics
 */

import * as dotenv from 'dotenv';
import { pathToFileURL } from 'url';
import { loadConfig, applyEnvOverrides, isOptimizationStrategy } from '../src/config.js';
import type { AnalyticsReport, LoopStatus, NoDataReport, OptimizerConfig } from '../src/types/common.js';
import { consoleLogger, silentLogger } from '../src/utils/logger.js';
import { createLoopFromConfig } from '../optimizer/index.js';

interface CLIOptions {
  command: string;
  args: string[];
  flags: Record<string, string | boolean>;
}

interface RunResult {
  status: LoopStatus;
  analytics: AnalyticsReport | NoDataReport;
  parameters: Record<string, number>;
}

// Flags that never take a value, so a following token stays positional
const BOOLEAN_FLAGS = new Set(['verbose']);

const DEFAULT_RUN_SECONDS = 2;

/**
 * Optimizer CLI for local runs
 */
class OptimizerCLI {
  async run(argv: string[]): Promise<void> {
    const options = this.parseArgs(argv);

    try {
      switch (options.command) {
        case 'run':
          await this.handleRun(options);
          break;

        case 'status':
          await this.handleStatus(options);
          break;

        case 'analytics':
          await this.handleAnalytics(options);
          break;

        case 'config':
          await this.handleConfig(options);
          break;

        case 'help':
        default:
          this.showHelp();
          break;
      }
    } catch (error) {
      console.error('❌ Command failed:', error);
      process.exit(1);
    }
  }

  private async handleRun(options: CLIOptions): Promise<void> {
    const result = await this.runLoop(options);

    if (options.flags.format === 'json') {
      console.log(JSON.stringify(result, null, 2));
      return;
    }

    this.printStatus(result.status);
    this.printAnalytics(result.analytics);
    this.printParameters(result.parameters);
  }

  private async handleStatus(options: CLIOptions): Promise<void> {
    const { status } = await this.runLoop(options);

    if (options.flags.format === 'json') {
      console.log(JSON.stringify(status, null, 2));
      return;
    }

    this.printStatus(status);
  }

  private async handleAnalytics(options: CLIOptions): Promise<void> {
    const { analytics } = await this.runLoop(options);

    if (options.flags.format === 'json') {
      console.log(JSON.stringify(analytics, null, 2));
      return;
    }

    this.printAnalytics(analytics);
  }

  private async handleConfig(options: CLIOptions): Promise<void> {
    const config = await this.resolveConfig(options);
    console.log(JSON.stringify(config, null, 2));
  }

  private async resolveConfig(options: CLIOptions): Promise<OptimizerConfig> {
    const configPath = typeof options.flags.config === 'string' ? options.flags.config : undefined;
    const config = applyEnvOverrides(await loadConfig(configPath));

    const strategy = options.flags.strategy;
    if (typeof strategy === 'string') {
      if (!isOptimizationStrategy(strategy)) {
        throw new Error(`Unknown strategy: ${strategy}`);
      }
      config.loop.strategy = strategy;
    }

    return config;
  }

  private async runLoop(options: CLIOptions): Promise<RunResult> {
    const config = await this.resolveConfig(options);
    const seconds = this.resolveSeconds(options.flags.seconds);

    const logger = options.flags.verbose ? consoleLogger : silentLogger;
    const { loop, store } = createLoopFromConfig(config, logger);

    console.log(`🚀 Running optimization loop for ${seconds}s (${config.loop.strategy} strategy)...`);
    loop.start(config.loop.strategy);
    await new Promise(resolve => setTimeout(resolve, seconds * 1000));
    await loop.stop();

    return { status: loop.getStatus(), analytics: loop.getAnalytics(), parameters: store.snapshot() };
  }

  /**
   * Run length in seconds. A bare `--seconds` with no value is rejected.
   */
  resolveSeconds(flag: string | boolean | undefined): number {
    if (flag === undefined) {
      return DEFAULT_RUN_SECONDS;
    }

    const seconds = typeof flag === 'string' ? Number(flag) : Number.NaN;
    if (!Number.isFinite(seconds) || seconds <= 0) {
      throw new Error(`--seconds must be a positive number, got ${flag}`);
    }
    return seconds;
  }

  private printStatus(status: LoopStatus): void {
    console.log('\n📊 LOOP STATUS');
    console.log('='.repeat(50));
    console.log(`State: ${status.state} (${status.strategy})`);
    console.log(`Latest composite: ${status.latest_composite === null ? 'n/a' : status.latest_composite.toFixed(3)}`);
    console.log(`Optimizations: ${status.successful_optimizations}/${status.total_optimizations} successful`);
    console.log(`Average improvement: ${status.average_improvement.toFixed(4)}`);
    console.log(`Optimization frequency: ${status.optimization_frequency.toFixed(2)}/s`);
    console.log(`History: ${status.history_length} snapshots, ${status.recent_action_count} actions`);
  }

  private printAnalytics(analytics: AnalyticsReport | NoDataReport): void {
    console.log('\n📈 ANALYTICS');
    console.log('='.repeat(50));

    if (analytics.status === 'no_data') {
      console.log(analytics.message);
      return;
    }

    const trendEmoji = analytics.overall_trend === 'improving' ? '🟢' : '🔴';
    console.log(`Trend: ${trendEmoji} ${analytics.overall_trend}`);
    console.log(`Period: ${analytics.optimization_period_seconds.toFixed(1)}s`);
    console.log(`Effectiveness: ${(analytics.optimization_effectiveness * 100).toFixed(1)}%`);

    console.log('\n🔧 AVERAGE METRICS');
    console.log('-'.repeat(30));
    Object.entries(analytics.average_metrics).forEach(([metric, value]) => {
      console.log(`${metric}: ${value.toFixed(3)}`);
    });

    console.log('\n🏗️ ACTION DISTRIBUTION');
    console.log('-'.repeat(30));
    Object.entries(analytics.action_distribution).forEach(([kind, count]) => {
      console.log(`${kind.replace(/_/g, ' ')}: ${count}`);
    });
  }

  private printParameters(parameters: Record<string, number>): void {
    console.log('\n🎛️ TUNED PARAMETERS');
    console.log('-'.repeat(30));

    const entries = Object.entries(parameters);
    if (entries.length === 0) {
      console.log('No parameters adjusted');
      return;
    }
    entries.forEach(([name, value]) => {
      console.log(`${name}: ${value.toFixed(3)}`);
    });
  }

  private showHelp(): void {
    console.log('Metrics Optimizer CLI');
    console.log('\nCommands:');
    console.log('  run                 Run the loop for --seconds, then print status, analytics and tuned parameters');
    console.log('  status              Run the loop for --seconds, then print status');
    console.log('  analytics           Run the loop for --seconds, then print analytics');
    console.log('  config              Print the resolved configuration');
    console.log('  help                Show this help message');

    console.log('\nFlags:');
    console.log('  --seconds=<n>       How long to run the loop (default: 2)');
    console.log('  --strategy=<name>   reactive | predictive | adaptive | proactive');
    console.log('  --config=<path>     Configuration file (default: config.yaml)');
    console.log('  --format=json       Output in JSON format');
    console.log('  --verbose           Log loop activity');

    console.log('\nExamples:');
    console.log('  npm run optimizer run --seconds 5');
    console.log('  npm run optimizer analytics --format=json');
  }

  parseArgs(argv: string[]): CLIOptions {
    const args = argv.slice(2);
    if (args.length === 0) {
      return { command: 'help', args: [], flags: {} };
    }

    const command = args[0];
    const flags: Record<string, string | boolean> = {};
    const remainingArgs: string[] = [];

    const rest = args.slice(1);
    for (let i = 0; i < rest.length; i++) {
      const arg = rest[i];
      if (arg.startsWith('--')) {
        const [key, value] = arg.slice(2).split('=');
        if (value !== undefined) {
          flags[key] = value || true;
          continue;
        }

        const next = rest[i + 1];
        if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('-')) {
          flags[key] = next;
          i += 1;
        } else {
          flags[key] = true;
        }
      } else if (arg.startsWith('-')) {
        flags[arg.slice(1)] = true;
      } else {
        remainingArgs.push(arg);
      }
    }

    return { command, args: remainingArgs, flags };
  }
}

// Main execution
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  dotenv.config();
  const cli = new OptimizerCLI();
  cli.run(process.argv).catch(error => {
    console.error('CLI error:', error);
    process.exit(1);
  });
}

export { OptimizerCLI };
