import { z } from 'zod';

// Only the fields the analyzer reads; anything else the downloader writes
// passes through unchecked.

const optionalText = z.string().nullish().transform(v => v ?? undefined);

const identifier = z.union([z.string().min(1), z.number()]).transform(String);

export const LogSummarySchema = z.object({
  livy_id: identifier,
  notebook_id: identifier.optional(),
  notebook_name: optionalText,
  workspace_id: optionalText,
  workspace_name: optionalText,
  spark_application_id: optionalText,
  app_url: optionalText,
  state: optionalText,
  start_time: optionalText,
  download_timestamp: optionalText,
  temp_directory: optionalText,
  downloaded_files: z.array(z.string()).default([]),
}).passthrough();

export const ConsolidatedFileSchema = z.object({
  metadata: z.record(z.string(), z.unknown()).optional(),
  log_summaries: z.array(LogSummarySchema),
}).passthrough();

export type LogSummary = z.infer<typeof LogSummarySchema>;
export type ConsolidatedFile = z.infer<typeof ConsolidatedFileSchema>;
