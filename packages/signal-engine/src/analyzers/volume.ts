import type { IndicatorSnapshot } from '@bullion/indicators';
import type { VolumeJudgment } from '@bullion/contracts';

const MAX_VOLUME_STRENGTH = 3.0;
const LOW_VOLUME_RATIO = 0.5;
const LOW_VOLUME_PENALTY = -1.0;

/**
 * Volume confirms but never directs, so the direction is always NEUTRAL.
 * High volume adds strength; very low volume is a penalty.
 */
export function analyzeVolume(snapshot: IndicatorSnapshot): VolumeJudgment {
  const { volumeRatio, isHighVolume } = snapshot.volume;
  const ratio = volumeRatio.toFixed(1);

  if (isHighVolume) {
    return {
      direction: 'NEUTRAL',
      strength: Math.min((volumeRatio - 1) * 2, MAX_VOLUME_STRENGTH),
      reasons: [`High volume confirmation (${ratio}x average)`],
      volumeRatio,
      isHighVolume,
    };
  }
  if (volumeRatio < LOW_VOLUME_RATIO) {
    return {
      direction: 'NEUTRAL',
      strength: LOW_VOLUME_PENALTY,
      reasons: [`Low volume warning (${ratio}x average)`],
      volumeRatio,
      isHighVolume,
    };
  }

  return { direction: 'NEUTRAL', strength: 0, reasons: [`Normal volume (${ratio}x average)`], volumeRatio, isHighVolume };
}
