import { z } from "zod";

export const DataMetadataSchema = z.object({
  n_objects: z.number().int().nonnegative(),
  n_timestamps: z.number().int().nonnegative(),
  anomaly_rate: z.number().min(0),
  data_type: z.literal("time_series"),
  source: z.literal("uploaded_dataset"),
});

export type DataMetadata = z.infer<typeof DataMetadataSchema>;
