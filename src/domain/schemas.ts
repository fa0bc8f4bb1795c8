import { z } from 'zod';
import { BANDS, GAS_BANDS, SERVICES, TARIFF_KINDS } from './types.js';

export const serviceSchema = z.enum(SERVICES);

const rateValue = z.number().finite().nonnegative();

export const consumptionSchema = z
  .object({
    f1: rateValue.optional(),
    f2: rateValue.optional(),
    f3: rateValue.optional(),
    annual: rateValue.optional(),
  })
  .strict();

export const electricityTariffSchema = z.object({
  kind: z.enum(TARIFF_KINDS),
  band: z.enum(BANDS),
  energyRate: rateValue,
  commercializationFee: rateValue,
  consumption: consumptionSchema.optional(),
});

export const gasTariffSchema = z.object({
  kind: z.enum(TARIFF_KINDS),
  band: z.enum(GAS_BANDS),
  energyRate: rateValue,
  commercializationFee: rateValue,
  consumption: consumptionSchema.optional(),
});

export const ratePairSchema = z.object({
  energyRate: rateValue,
  commercializationFee: rateValue,
});

export const notifiedSnapshotSchema = z.object({
  electricity: ratePairSchema.optional(),
  gas: ratePairSchema.optional(),
});

export const fragmentPayloadSchema = z.object({
  electricity: electricityTariffSchema,
  gas: gasTariffSchema.optional(),
  updatedServices: z.array(serviceSchema),
});

export const telegramCallbackQuerySchema = z.object({
  id: z.string().min(1),
  from: z.object({ id: z.number().int() }),
  data: z.string().optional(),
  message: z
    .object({
      message_id: z.number().int(),
      chat: z.object({ id: z.number().int() }),
      text: z.string().optional(),
    })
    .optional(),
});

export const telegramUpdateSchema = z
  .object({
    update_id: z.number().int(),
    callback_query: telegramCallbackQuerySchema.optional(),
  })
  .passthrough();

export const telegramAuthUserSchema = z
  .object({
    id: z.number().int(),
    first_name: z.string().optional(),
    username: z.string().optional(),
  })
  .passthrough();

export type FragmentPayload = z.infer<typeof fragmentPayloadSchema>;
export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;
export type TelegramCallbackQuery = z.infer<typeof telegramCallbackQuerySchema>;
export type TelegramAuthUser = z.infer<typeof telegramAuthUserSchema>;
