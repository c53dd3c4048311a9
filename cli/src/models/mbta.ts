import { z } from "zod";
import { listResponseSchema, resourceSchema } from "./jsonApi";

const stopTimesSchema = z.object({
  arrival_time: z.string().nullable(),
  departure_time: z.string().nullable(),
});

export const mbtaScheduleSchema = resourceSchema("schedule", stopTimesSchema);
export const mbtaPredictionSchema = resourceSchema("prediction", stopTimesSchema);
// Only the parent_station relationship is read from stops.
export const mbtaStopSchema = resourceSchema("stop", z.object({}));

export const mbtaScheduleResponseSchema = listResponseSchema(mbtaScheduleSchema);
export const mbtaPredictionResponseSchema = listResponseSchema(mbtaPredictionSchema);
export const mbtaStopResponseSchema = listResponseSchema(mbtaStopSchema);

export type MbtaSchedule = z.infer<typeof mbtaScheduleSchema>;
export type MbtaPrediction = z.infer<typeof mbtaPredictionSchema>;
export type MbtaStop = z.infer<typeof mbtaStopSchema>;
