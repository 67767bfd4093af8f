/**
 * Terminal report formatter for signals, timeframe summaries and session info.
 * Pure string builders; the CLI decides where the text goes.
 */

import chalk from 'chalk';
import {
  describeTimeframe,
  getAllChartTimeframes,
  type CompositeDirection,
  type TradeSignal,
} from '@bullion/contracts';
import type { SignalEngineConfig } from '@bullion/signal-engine';
import type { BacktestReport, MultiTimeframeResult } from '../bot.js';
import type { Config } from '../config/index.js';
import type { SessionSummary } from '../session-log.js';

/**
 * Formatter for analysis output
 */
export class SignalFormatter {
  /**
   * Full breakdown of one signal
   */
  formatSignal(signal: TradeSignal, symbol: string): string {
    const lines: string[] = [];
    const rule = chalk.blue('='.repeat(80));
    const { components, risk, marketContext: context } = signal;

    lines.push(rule);
    lines.push(chalk.blue.bold(`GOLD SIGNAL ANALYSIS - ${symbol} - ${this.formatTimestamp(signal.timestamp)}`));
    lines.push(rule);
    lines.push('');

    lines.push(chalk.blue('CURRENT MARKET STATUS:'));
    lines.push(`  Price: ${this.formatPrice(signal.currentPrice)}`);
    lines.push('');

    lines.push(this.colorFor(signal.direction)('TRADING SIGNAL:'));
    lines.push(`  Signal: ${this.formatDirection(signal.direction)}`);
    lines.push(`  Strength: ${signal.strength.toFixed(1)}/10`);
    lines.push(`  Confidence: ${signal.confidence.toFixed(1)}/10`);
    lines.push(`  Consensus: ${(signal.consensus * 100).toFixed(0)}%`);
    lines.push(`  Recommendation: ${signal.recommendation}`);
    lines.push('');

    lines.push(chalk.blue('TECHNICAL ANALYSIS BREAKDOWN:'));
    lines.push('  EMA Analysis:');
    lines.push(`    Signal: ${this.formatDirection(components.trend.direction)} (Strength: ${components.trend.strength.toFixed(1)})`);
    lines.push(`    Trend: ${components.trend.trendDirection} (Strength: ${components.trend.trendStrength.toFixed(1)})`);
    lines.push(...this.formatReasons(components.trend.reasons));

    lines.push('  RSI Analysis:');
    lines.push(`    Signal: ${this.formatDirection(components.rsi.direction)} (Strength: ${components.rsi.strength.toFixed(1)})`);
    lines.push(`    Current RSI: ${components.rsi.currentRsi.toFixed(1)} (${components.rsi.condition})`);
    lines.push(`    Momentum: ${this.formatSigned(components.rsi.momentum)}`);
    lines.push(...this.formatReasons(components.rsi.reasons));

    lines.push('  Volume Analysis:');
    lines.push(`    Volume Ratio: ${components.volume.volumeRatio.toFixed(1)}x average`);
    lines.push(`    Status: ${components.volume.isHighVolume ? 'HIGH VOLUME' : 'NORMAL VOLUME'}`);
    lines.push(...this.formatReasons(components.volume.reasons));

    lines.push('  Support/Resistance:');
    lines.push(`    Signal: ${this.formatDirection(components.priceStructure.direction)} (Strength: ${components.priceStructure.strength.toFixed(1)})`);
    lines.push(`    Support Level: ${this.formatPrice(components.priceStructure.supportLevel)}`);
    lines.push(`    Resistance Level: ${this.formatPrice(components.priceStructure.resistanceLevel)}`);
    lines.push(...this.formatReasons(components.priceStructure.reasons));
    lines.push('');

    lines.push(chalk.red('RISK MANAGEMENT:'));
    lines.push(`  Stop Loss: ${this.formatPrice(risk.stopLoss)} (${this.formatChange(risk.stopLoss, signal.currentPrice)})`);
    lines.push(`  Take Profit: ${this.formatPrice(risk.takeProfit)} (${this.formatChange(risk.takeProfit, signal.currentPrice)})`);
    lines.push(`  Risk Amount: ${this.formatPrice(risk.riskAmount)}`);
    lines.push(`  Reward Amount: ${this.formatPrice(risk.rewardAmount)}`);
    lines.push(`  Risk/Reward Ratio: 1:${risk.riskRewardRatio.toFixed(1)}`);
    lines.push(`  ATR (Volatility): ${this.formatPrice(risk.atrValue)}`);
    lines.push('');

    lines.push(chalk.blue('MARKET CONTEXT:'));
    lines.push(`  Overall Trend: ${context.trendDirection} (Strength: ${context.trendStrength.toFixed(1)})`);
    lines.push(`  RSI Condition: ${context.rsiCondition}`);
    lines.push(`  Volume Status: ${context.volumeStatus}`);
    lines.push(`  Key Support: ${this.formatPrice(context.supportLevel)}`);
    lines.push(`  Key Resistance: ${this.formatPrice(context.resistanceLevel)}`);
    lines.push(rule);

    return lines.join('\n');
  }

  /**
   * One row per timeframe plus the consensus vote
   */
  formatMultiTimeframe(result: MultiTimeframeResult): string {
    const lines: string[] = [];

    lines.push(chalk.blue.bold('MULTI-TIMEFRAME ANALYSIS SUMMARY'));
    lines.push('='.repeat(60));

    if (result.consensus.total === 0) {
      lines.push('No valid results to display');
      return lines.join('\n');
    }

    lines.push(
      `${this.padRight('Timeframe', 44)} ${this.padRight('Signal', 8)} ${this.padRight('Strength', 10)} ${this.padRight('Confidence', 12)} Price`
    );
    lines.push('-'.repeat(86));

    for (const timeframe of getAllChartTimeframes()) {
      const signal = result.results[timeframe];
      const label = this.padRight(describeTimeframe(timeframe), 44);
      if (!signal) {
        lines.push(`${label} ${chalk.gray('no data')}`);
        continue;
      }
      lines.push(
        `${label} ${this.colorFor(signal.direction)(this.padRight(signal.direction, 8))} ` +
          `${this.padRight(`${signal.strength.toFixed(1)}/10`, 10)} ` +
          `${this.padRight(`${signal.confidence.toFixed(1)}/10`, 12)} ${this.formatPrice(signal.currentPrice)}`
      );
    }

    lines.push('');
    const { consensus } = result;
    const colored = consensus.direction ? this.colorFor(consensus.direction)(consensus.label) : consensus.label;
    lines.push(`Consensus Signal: ${colored}`);

    return lines.join('\n');
  }

  formatBacktest(report: BacktestReport): string {
    if (report.status === 'FAILED') {
      return chalk.red(`Backtest failed for the ${describeTimeframe(report.timeframe)}`);
    }

    const metrics = report.performanceMetrics;
    return [
      chalk.blue.bold('BACKTEST RESULT'),
      `  Timeframe: ${describeTimeframe(report.timeframe)}`,
      `  Signal: ${this.formatDirection(report.result.direction)}`,
      `  Signal Strength: ${metrics.signalStrength.toFixed(1)}/10`,
      `  Confidence Score: ${metrics.confidenceScore.toFixed(1)}/10`,
      `  Risk/Reward Ratio: 1:${metrics.riskRewardRatio.toFixed(1)}`,
      `  Potential Risk: ${this.formatPrice(metrics.potentialRisk)}`,
      `  Potential Reward: ${this.formatPrice(metrics.potentialReward)}`,
    ].join('\n');
  }

  formatSystemInfo(config: Config, signalConfig: SignalEngineConfig, session: SessionSummary): string {
    return [
      chalk.blue.bold('SYSTEM INFORMATION'),
      '='.repeat(50),
      `  Default Symbol: ${config.app.symbol}`,
      `  Alpha Vantage API: ${config.provider.alphaVantageApiKey ? 'Active' : 'Not configured'}`,
      `  Demo Mode: ${config.app.demoMode ? 'on' : 'off'}`,
      `  EMA Periods: ${signalConfig.emaShortPeriod}, ${signalConfig.emaLongPeriod}`,
      `  RSI Settings: ${signalConfig.rsiPeriod} period, ${signalConfig.rsiOversold}-${signalConfig.rsiOverbought} levels`,
      `  Risk Management: ${config.risk.defaultRiskPercent}% risk, ${signalConfig.stopLossAtrMultiplier}x ATR stop, 1:${signalConfig.takeProfitRatio} take profit`,
      `  Max Position Size: ${this.formatPrice(config.risk.maxPositionSize)}`,
      `  Trading Mode: ${config.trading.mode}`,
      '',
      '  Session Statistics:',
      `    Runtime: ${session.runtimeMinutes.toFixed(1)} minutes`,
      `    Analyses: ${session.analysesPerformed}`,
      `    Signals: ${session.totalSignals}`,
    ].join('\n');
  }

  formatSessionSummary(session: SessionSummary): string {
    const dist = session.signalDistribution;
    return [
      chalk.blue.bold('SESSION SUMMARY'),
      `  Runtime: ${session.runtimeMinutes.toFixed(1)} minutes`,
      `  Analyses performed: ${session.analysesPerformed}`,
      `  Signals generated: ${session.totalSignals}`,
      `  Signal distribution: BUY(${dist.BUY}) SELL(${dist.SELL}) HOLD(${dist.HOLD})`,
    ].join('\n');
  }

  formatError(message: string): string {
    return chalk.red(`ERROR: ${message}`);
  }

  private formatReasons(reasons: readonly string[]): string[] {
    return reasons.map((reason) => `    - ${reason}`);
  }

  private formatDirection(direction: CompositeDirection | 'NEUTRAL'): string {
    return this.colorFor(direction)(direction);
  }

  private colorFor(direction: CompositeDirection | 'NEUTRAL'): (text: string) => string {
    switch (direction) {
      case 'BUY':
        return chalk.green;
      case 'SELL':
      case 'ERROR':
        return chalk.red;
      default:
        return chalk.yellow;
    }
  }

  /**
   * `2025-01-15T18:40:00.000Z` -> `2025-01-15 18:40:00 UTC`
   */
  private formatTimestamp(iso: string): string {
    return `${iso.slice(0, 19).replace('T', ' ')} UTC`;
  }

  private formatChange(level: number, price: number): string {
    if (price === 0) return 'n/a';
    return `${this.formatSigned(((level - price) / price) * 100)}%`;
  }

  private formatSigned(value: number): string {
    const text = value.toFixed(1);
    return value >= 0 || text === '-0.0' ? `+${text.replace('-', '')}` : text;
  }

  private formatPrice(value: number): string {
    return `$${value.toFixed(2)}`;
  }

  private padRight(str: string, length: number): string {
    return str.padEnd(length);
  }
}
