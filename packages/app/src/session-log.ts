/**
 * @fileoverview In-memory record of the signals produced during one process run.
 */

import type { SignalDirection, TradeSignal } from '@bullion/contracts';
import type { ClockFn } from '@bullion/market-data';

export interface SignalRecord {
  timestamp: string;
  signal: SignalDirection;
  strength: number;
  confidence: number;
}

export interface SessionSummary {
  sessionStart: string;
  runtimeMinutes: number;
  analysesPerformed: number;
  totalSignals: number;
  lastAnalysis: TradeSignal | null;
  signalDistribution: Record<SignalDirection, number>;
}

export class SessionLog {
  private readonly startedAt: number;
  private readonly records: SignalRecord[] = [];
  private lastAnalysis: TradeSignal | null = null;

  constructor(private readonly now: ClockFn = Date.now) {
    this.startedAt = now();
  }

  record(signal: TradeSignal): SignalRecord {
    const entry: SignalRecord = {
      timestamp: signal.timestamp,
      signal: signal.direction,
      strength: signal.strength,
      confidence: signal.confidence,
    };
    this.records.push(entry);
    this.lastAnalysis = signal;
    return entry;
  }

  get entries(): readonly SignalRecord[] {
    return this.records;
  }

  summary(): SessionSummary {
    const signalDistribution: Record<SignalDirection, number> = { BUY: 0, SELL: 0, HOLD: 0 };
    for (const entry of this.records) {
      signalDistribution[entry.signal] += 1;
    }

    return {
      sessionStart: new Date(this.startedAt).toISOString(),
      runtimeMinutes: (this.now() - this.startedAt) / 60_000,
      analysesPerformed: this.records.length,
      totalSignals: this.records.length,
      lastAnalysis: this.lastAnalysis,
      signalDistribution,
    };
  }
}
