import { parseTimestamp } from '../../cursors/timestamps';
import type { EnergyKind, MeterRef, TariffRef } from '../../records/types';
import type { OctopusAccount, OctopusAgreement } from './types';

export type ParsedTariffCode = {
  kind: string;
  register: string | null;
  productCode: string | null;
  region: string | null;
};

/**
 * Splits a tariff code such as `E-1R-AGILE-24-09-01-A` into kind `E`, register
 * `1R`, product `AGILE-24-09-01` and region `A`. The last segment is the region
 * only when it is a single character.
 */
export function parseTariffCode(tariffCode: string): ParsedTariffCode {
  const parts = tariffCode.split('-');
  if (parts.length < 3) {
    return { kind: parts[0]?.charAt(0) ?? '', register: null, productCode: null, region: null };
  }
  const last = parts[parts.length - 1] ?? '';
  const region = last.length === 1 ? last : null;
  const core = region ? parts.slice(2, -1) : parts.slice(2);
  return {
    kind: (parts[0] ?? '').charAt(0),
    register: parts[1] ?? null,
    productCode: core.length > 0 ? core.join('-') : null,
    region
  };
}

export function tariffEnergy(tariffCode: string): EnergyKind {
  return tariffCode.startsWith('E-') || tariffCode.includes('-E-') ? 'electricity' : 'gas';
}

export function consumptionPath(meter: MeterRef): string {
  const points = meter.energy === 'electricity' ? 'electricity-meter-points' : 'gas-meter-points';
  return `/${points}/${encodeURIComponent(meter.mpanMprn)}/meters/${encodeURIComponent(meter.serial)}/consumption/`;
}

export function unitRatePath(tariff: Pick<TariffRef, 'productCode' | 'tariffCode'>): string {
  const tariffs = tariffEnergy(tariff.tariffCode) === 'electricity' ? 'electricity-tariffs' : 'gas-tariffs';
  return `/products/${encodeURIComponent(tariff.productCode)}/${tariffs}/${encodeURIComponent(
    tariff.tariffCode
  )}/standard-unit-rates/`;
}

/** Query timestamps are whole-second UTC with a `Z` suffix. */
export function formatQueryTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

export function tariffFromCode(tariffCode: string, productCode?: string): TariffRef | null {
  const product = productCode ?? parseTariffCode(tariffCode).productCode;
  if (!product) {
    return null;
  }
  return { energy: tariffEnergy(tariffCode), productCode: product, tariffCode };
}

/** Agreement whose `[valid_from, valid_to)` contains `asOf`, latest `valid_from` first. */
export function selectActiveAgreement(
  agreements: readonly OctopusAgreement[],
  asOf: Date
): { tariffCode: string; productCode: string } | null {
  let chosen: { tariffCode: string; productCode: string; from: number } | null = null;
  for (const agreement of agreements) {
    const tariffCode = agreement.tariff_code ?? agreement.tariff;
    if (!tariffCode) {
      continue;
    }
    const from = parseTimestamp(agreement.valid_from);
    const to = agreement.valid_to ? parseTimestamp(agreement.valid_to) : null;
    if (!from || (agreement.valid_to && !to)) {
      continue;
    }
    const active = from.getTime() <= asOf.getTime() && (to === null || asOf.getTime() < to.getTime());
    if (!active || (chosen && from.getTime() <= chosen.from)) {
      continue;
    }
    const productCode = parseTariffCode(tariffCode).productCode;
    if (productCode) {
      chosen = { tariffCode, productCode, from: from.getTime() };
    }
  }
  return chosen ? { tariffCode: chosen.tariffCode, productCode: chosen.productCode } : null;
}

function meterPoints(account: OctopusAccount) {
  const electricity = [...(account.electricity_meter_points ?? [])];
  const gas = [...(account.gas_meter_points ?? [])];
  for (const property of account.properties ?? []) {
    electricity.push(...(property.electricity_meter_points ?? []));
    gas.push(...(property.gas_meter_points ?? []));
  }
  return { electricity, gas };
}

/** Active tariff per energy kind; the first meter point with an active agreement decides. */
export function discoverActiveTariffs(account: OctopusAccount, asOf: Date): TariffRef[] {
  const { electricity, gas } = meterPoints(account);
  const tariffs: TariffRef[] = [];
  const groups: Array<[EnergyKind, Array<{ agreements?: OctopusAgreement[] | null }>]> = [
    ['electricity', electricity],
    ['gas', gas]
  ];
  for (const [energy, points] of groups) {
    for (const point of points) {
      const active = selectActiveAgreement(point.agreements ?? [], asOf);
      if (active) {
        tariffs.push({ energy, productCode: active.productCode, tariffCode: active.tariffCode });
        break;
      }
    }
  }
  return tariffs;
}

export function listAccountMeters(account: OctopusAccount): MeterRef[] {
  const { electricity, gas } = meterPoints(account);
  const meters: MeterRef[] = [];
  for (const point of electricity) {
    const mpan = point.mpan ?? point.mpan_number ?? point.mpan_mprn;
    for (const meter of point.meters ?? []) {
      const serial = meter.serial_number ?? meter.serial;
      if (mpan && serial) {
        meters.push({ energy: 'electricity', mpanMprn: mpan, serial });
      }
    }
  }
  for (const point of gas) {
    const mprn = point.mprn ?? point.mprn_number ?? point.mpan_mprn;
    for (const meter of point.meters ?? []) {
      const serial = meter.serial_number ?? meter.serial;
      if (mprn && serial) {
        meters.push({ energy: 'gas', mpanMprn: mprn, serial });
      }
    }
  }
  return meters;
}
