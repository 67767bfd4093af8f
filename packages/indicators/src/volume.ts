import { HIGH_VOLUME_RATIO } from './config.js';
import { meanOf, requireLength, requirePeriod } from './series.js';
import type { VolumeProfile } from './types.js';

/**
 * Current volume relative to the trailing `period` average.
 */
export function volumeProfile(volume: readonly number[], period: number): VolumeProfile {
  requirePeriod('Volume profile', period);
  requireLength('Volume profile', volume, 1);

  const start = Math.max(0, volume.length - period);
  const averageVolume = meanOf(volume, start, volume.length);
  const currentVolume = volume[volume.length - 1] ?? 0;
  const volumeRatio = averageVolume > 0 ? currentVolume / averageVolume : 1.0;

  return {
    currentVolume,
    averageVolume,
    volumeRatio,
    isHighVolume: volumeRatio > HIGH_VOLUME_RATIO,
  };
}
