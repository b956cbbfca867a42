export type EnergyKind = 'electricity' | 'gas';

export type SensorType = 'inside' | 'target';

export type ConsumptionRecord = {
  interval_start: string;
  interval_end: string;
  consumption: number;
  energy: EnergyKind;
  mpan_mprn: string;
  serial: string;
};

export type UnitRateRecord = {
  valid_from: string;
  /** `null` for an open-ended rate. */
  valid_to: string | null;
  value_inc_vat: number;
  value_exc_vat: number | null;
  energy: EnergyKind;
  product_code: string;
  tariff_code: string;
};

export type DemandRecord = {
  timestamp: string;
  duration_minutes: number | null;
  heat_demand: string;
  device_id: string;
  zone_id: string;
};

export type TemperatureRecord = {
  timestamp: string;
  temperature: number;
  sensor_type: SensorType;
  humidity: number | null;
  device_id: string;
  zone_id: string;
};

export type CostedConsumptionRecord = ConsumptionRecord & {
  unit_rate: number | null;
  cost: number | null;
  tariff_code: string | null;
};

export type MeterRef = {
  energy: EnergyKind;
  mpanMprn: string;
  serial: string;
};

export type TariffRef = {
  energy: EnergyKind;
  productCode: string;
  tariffCode: string;
};

export type DeviceRef = {
  deviceId: string;
  zoneId: string;
  name?: string;
};

export type NormalizeResult<R> = {
  records: R[];
  skipped: number;
};
