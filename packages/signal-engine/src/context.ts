import type { IndicatorSnapshot } from '@bullion/indicators';
import type { MarketContext } from '@bullion/contracts';

/**
 * Market state summary shown alongside a signal.
 */
export function buildMarketContext(snapshot: IndicatorSnapshot): MarketContext {
  return {
    trendDirection: snapshot.trend.direction,
    trendStrength: snapshot.trend.strength,
    rsiCondition: snapshot.rsiAnalysis.condition,
    volumeStatus: snapshot.volume.isHighVolume ? 'HIGH' : 'NORMAL',
    supportLevel: snapshot.levels.support,
    resistanceLevel: snapshot.levels.resistance,
  };
}
