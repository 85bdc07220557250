/**
 * Zod schemas for runtime validation of monitoring snapshot files.
 *
 * Snapshots are written by the bandwidth aggregation process and read on
 * every redraw, so malformed files are caught here before any table is
 * built.
 *
 * Design decisions:
 * - Use .passthrough() to allow extra fields for forward compatibility
 * - Counters are non-negative integers; ports fit in 16 bits
 */

import { z } from 'zod';

const ByteCounter = z.number().int().nonnegative();
const Port = z.number().int().min(0).max(65_535);

/**
 * Schema for one connection record.
 */
export const ConnectionRecordSchema = z
  .object({
    localPort: Port,
    remoteIp: z.string().min(1),
    remotePort: Port,
    protocol: z.enum(['tcp', 'udp']),
    interfaceName: z.string(),
    processName: z.string(),
    totalBytesUploaded: ByteCounter,
    totalBytesDownloaded: ByteCounter,
  })
  .passthrough();

/**
 * Schema for a per-process aggregate.
 */
export const ProcessRecordSchema = z
  .object({
    name: z.string(),
    connectionCount: z.number().int().nonnegative(),
    totalBytesUploaded: ByteCounter,
    totalBytesDownloaded: ByteCounter,
  })
  .passthrough();

/**
 * Schema for a per-remote-address aggregate.
 */
export const RemoteAddressRecordSchema = z
  .object({
    address: z.string().min(1),
    connectionCount: z.number().int().nonnegative(),
    totalBytesUploaded: ByteCounter,
    totalBytesDownloaded: ByteCounter,
  })
  .passthrough();

/**
 * Schema for a complete snapshot file.
 */
export const SnapshotFileSchema = z
  .object({
    connections: z.array(ConnectionRecordSchema),
    processes: z.array(ProcessRecordSchema),
    remoteAddresses: z.array(RemoteAddressRecordSchema),
    hostnames: z.record(z.string(), z.string()).optional(),
  })
  .passthrough();

export type ConnectionRecord = z.infer<typeof ConnectionRecordSchema>;
export type ProcessRecord = z.infer<typeof ProcessRecordSchema>;
export type RemoteAddressRecord = z.infer<typeof RemoteAddressRecordSchema>;
export type SnapshotFile = z.infer<typeof SnapshotFileSchema>;

/**
 * Format a Zod validation error as one line per issue.
 *
 * @param error - Validation error
 * @param source - Where the data came from, for the heading
 */
export function formatValidationError(error: z.ZodError, source: string): string {
  const issues = error.issues;

  if (issues.length === 0) {
    return `Invalid snapshot ${source}: Unknown validation error`;
  }

  const fieldErrors = issues.map((issue) => {
    const path = issue.path.join('.');
    const pathDisplay = path || 'root';
    return `  - ${pathDisplay}: ${issue.message}`;
  });

  return `Invalid snapshot ${source}:\n` + fieldErrors.join('\n');
}
