import { AcquisitionResult } from './acquisition';

function numberOf(values: AcquisitionResult, name: string): number | null {
    const v = values.get(name);
    return v && v.kind === 'number' ? v.value : null;
}

/**
 * Crystal wear of one channel in percent: how far the resonance frequency
 * has fallen from the fresh-crystal maximum towards the end-of-life minimum.
 *
 * Reads `<ch>_Frequency_0p01Hz`, `<ch>_MinFreq_Hz` and `<ch>_MaxFreq_Hz`;
 * returns 0 when any is missing or the limits are inverted.
 */
export function computeCrystalUsage(values: AcquisitionResult, channelPrefix: string): number {
    const current = numberOf(values, `${channelPrefix}_Frequency_0p01Hz`);
    const min = numberOf(values, `${channelPrefix}_MinFreq_Hz`);
    const max = numberOf(values, `${channelPrefix}_MaxFreq_Hz`);
    if (current === null || min === null || max === null || max <= min) {
        return 0;
    }
    const usage = (max - current) / (max - min);
    return Math.max(0, Math.min(1, usage)) * 100;
}
