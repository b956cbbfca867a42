import { z } from 'zod';

const agreementSchema = z
  .object({
    tariff_code: z.string().nullish(),
    tariff: z.string().nullish(),
    valid_from: z.string().nullish(),
    valid_to: z.string().nullish()
  })
  .passthrough();

const meterSchema = z
  .object({
    serial_number: z.string().nullish(),
    serial: z.string().nullish()
  })
  .passthrough();

const electricityPointSchema = z
  .object({
    mpan: z.string().nullish(),
    mpan_number: z.string().nullish(),
    mpan_mprn: z.string().nullish(),
    meters: z.array(meterSchema).nullish(),
    agreements: z.array(agreementSchema).nullish()
  })
  .passthrough();

const gasPointSchema = z
  .object({
    mprn: z.string().nullish(),
    mprn_number: z.string().nullish(),
    mpan_mprn: z.string().nullish(),
    meters: z.array(meterSchema).nullish(),
    agreements: z.array(agreementSchema).nullish()
  })
  .passthrough();

const propertySchema = z
  .object({
    electricity_meter_points: z.array(electricityPointSchema).nullish(),
    gas_meter_points: z.array(gasPointSchema).nullish()
  })
  .passthrough();

/** Meter points appear either at the top level or under `properties`. */
export const accountSchema = propertySchema.extend({
  number: z.string().nullish(),
  properties: z.array(propertySchema).nullish()
});

export type OctopusAgreement = z.infer<typeof agreementSchema>;
export type OctopusElectricityPoint = z.infer<typeof electricityPointSchema>;
export type OctopusGasPoint = z.infer<typeof gasPointSchema>;
export type OctopusAccount = z.infer<typeof accountSchema>;

export const pageSchema = z
  .object({
    results: z.array(z.unknown()),
    next: z.string().nullish()
  })
  .passthrough();

export type OctopusPage = z.infer<typeof pageSchema>;
