import { parseTimestamp } from '../cursors/timestamps';
import type { ConsumptionRecord, CostedConsumptionRecord, UnitRateRecord } from '../records/types';

type IndexedRate = {
  from: number;
  to: number | null;
  rate: UnitRateRecord;
};

function indexRates(rates: readonly UnitRateRecord[]): IndexedRate[] {
  const indexed: IndexedRate[] = [];
  for (const rate of rates) {
    const from = parseTimestamp(rate.valid_from);
    if (!from) {
      continue;
    }
    const to = rate.valid_to === null ? null : parseTimestamp(rate.valid_to);
    indexed.push({ from: from.getTime(), to: to ? to.getTime() : null, rate });
  }
  return indexed.sort((a, b) => a.from - b.from);
}

/** Index of the last rate starting at or before `instant`, or -1. */
function lastStartingBefore(rates: readonly IndexedRate[], instant: number): number {
  let low = 0;
  let high = rates.length;
  while (low < high) {
    const middle = (low + high) >>> 1;
    if ((rates[middle]?.from ?? Number.POSITIVE_INFINITY) <= instant) {
      low = middle + 1;
    } else {
      high = middle;
    }
  }
  return low - 1;
}

/**
 * Attaches the unit rate whose `[valid_from, valid_to)` contains each interval
 * start, and the resulting cost. Only rates of the interval's energy kind apply;
 * intervals without a covering rate keep `null` rate and cost.
 */
export function joinUnitRates(
  consumption: readonly ConsumptionRecord[],
  rates: readonly UnitRateRecord[]
): CostedConsumptionRecord[] {
  const byEnergy = {
    electricity: indexRates(rates.filter((rate) => rate.energy === 'electricity')),
    gas: indexRates(rates.filter((rate) => rate.energy === 'gas'))
  };

  return consumption.map((interval) => {
    const start = parseTimestamp(interval.interval_start);
    const candidates = byEnergy[interval.energy];
    const index = start ? lastStartingBefore(candidates, start.getTime()) : -1;
    const match = index >= 0 ? candidates[index] : undefined;
    const covers = match !== undefined && start !== null && (match.to === null || start.getTime() < match.to);
    if (!covers || !match) {
      return { ...interval, unit_rate: null, cost: null, tariff_code: null };
    }
    const unitRate = match.rate.value_inc_vat;
    return {
      ...interval,
      unit_rate: unitRate,
      cost: interval.consumption * unitRate,
      tariff_code: match.rate.tariff_code
    };
  });
}

export function totalCost(records: readonly CostedConsumptionRecord[]): number {
  return records.reduce((sum, record) => sum + (record.cost ?? 0), 0);
}
