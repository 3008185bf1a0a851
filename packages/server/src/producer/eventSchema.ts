import { TRADE_SIDES, type TelemetryEvent } from "@ticktape/shared";
import { z } from "zod";

const text = z.string();
const price = z.number().finite();

/**
 * Shape check at the producer boundary, for events that arrive from outside
 * the process. Empty text is valid on the wire; wire limits (text byte
 * length, u32/f32 range) are the encoder's to enforce.
 */
export const telemetryEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("log"), level: text, message: text }),
  z.object({
    type: z.literal("match"),
    side: z.enum(TRADE_SIDES),
    quantity: z.number().int().nonnegative(),
    symbol: text,
    price,
  }),
  z.object({ type: z.literal("price_update"), symbol: text, oldPrice: price, newPrice: price }),
]);

export type ParsedTelemetryEvent = z.infer<typeof telemetryEventSchema>;

export const parseTelemetryEvent = (input: unknown): TelemetryEvent => telemetryEventSchema.parse(input);
