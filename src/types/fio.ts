import { z } from "zod";

// --- fio --output-format=json shape ---
//
// Only the fields the aggregator reads are declared; everything else fio
// emits passes through untouched.

const LatencyStatsSchema = z
	.object({
		max: z.number().default(0),
		mean: z.number(),
		percentile: z.record(z.string(), z.number()).optional(),
	})
	.passthrough();

const DirectionStatsSchema = z
	.object({
		io_bytes: z.number(),
		/** KiB/s */
		bw: z.number(),
		iops: z.number(),
		lat_ns: LatencyStatsSchema,
		// percentile distributions live under clat_ns, lat_ns only has mean/min/max
		clat_ns: LatencyStatsSchema.optional(),
	})
	.passthrough();

const FioJobSchema = z
	.object({
		jobname: z.string(),
		error: z.number().optional(),
		read: DirectionStatsSchema.optional(),
		write: DirectionStatsSchema.optional(),
	})
	.passthrough();

export const FioOutputSchema = z
	.object({
		"fio version": z.string().optional(),
		jobs: z.array(FioJobSchema).min(1),
	})
	.passthrough();

export type FioLatencyStats = z.infer<typeof LatencyStatsSchema>;
export type FioDirectionStats = z.infer<typeof DirectionStatsSchema>;
export type FioJob = z.infer<typeof FioJobSchema>;
export type FioOutput = z.infer<typeof FioOutputSchema>;
