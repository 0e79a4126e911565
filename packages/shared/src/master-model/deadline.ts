/**
 * Application deadline window. At most one window is active at a time.
 */
import { z } from "zod";
import { ISODateTime, NonEmptyString } from "./primitives";

export const DeadlineWindowSchema = z.object({
  id: z.number().int().positive(),
  name: NonEmptyString,
  startDate: z.date(),
  endDate: z.date(),
  isActive: z.boolean(),
  createdAt: z.date(),
  updatedAt: z.date(),
});

export type DeadlineWindow = z.infer<typeof DeadlineWindowSchema>;

export const DeadlineInputSchema = z
  .object({
    name: NonEmptyString.max(100),
    startDate: ISODateTime.pipe(z.coerce.date()),
    endDate: ISODateTime.pipe(z.coerce.date()),
    isActive: z.boolean().default(true),
  })
  .strict()
  .refine((value) => value.startDate.getTime() < value.endDate.getTime(), {
    message: "startDate must be before endDate",
    path: ["endDate"],
  });

export type DeadlineInput = z.output<typeof DeadlineInputSchema>;
