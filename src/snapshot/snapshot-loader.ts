/**
 * Snapshot loading: JSON file -> validated MonitoringSnapshot.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type {
  Connection,
  ConnectionData,
  HostnameMap,
  MonitoringSnapshot,
  NetworkData,
} from '../types/monitoring.js';
import { formatValidationError, SnapshotFileSchema } from './schemas.js';
import type { SnapshotFile } from './schemas.js';

/**
 * A snapshot together with the hostnames resolved for it.
 */
export interface LoadedSnapshot {
  snapshot: MonitoringSnapshot;
  hostnames: HostnameMap;
}

/**
 * Convert validated snapshot records into keyed collections.
 *
 * Records with the same process name or address are summed, since the
 * tables key rows by them.
 */
export function toMonitoringSnapshot(file: SnapshotFile): LoadedSnapshot {
  const connections = new Map<Connection, ConnectionData>();
  for (const record of file.connections) {
    const connection: Connection = {
      localPort: record.localPort,
      remoteIp: record.remoteIp,
      remotePort: record.remotePort,
      protocol: record.protocol,
    };
    connections.set(connection, {
      processName: record.processName,
      interfaceName: record.interfaceName,
      totalBytesUploaded: record.totalBytesUploaded,
      totalBytesDownloaded: record.totalBytesDownloaded,
    });
  }

  const processes = new Map<string, NetworkData>();
  for (const record of file.processes) {
    processes.set(record.name, mergeNetworkData(processes.get(record.name), record));
  }

  const remoteAddresses = new Map<string, NetworkData>();
  for (const record of file.remoteAddresses) {
    remoteAddresses.set(
      record.address,
      mergeNetworkData(remoteAddresses.get(record.address), record)
    );
  }

  return {
    snapshot: { connections, processes, remoteAddresses },
    hostnames: new Map(Object.entries(file.hostnames ?? {})),
  };
}

function mergeNetworkData(
  existing: NetworkData | undefined,
  record: NetworkData
): NetworkData {
  return {
    connectionCount: (existing?.connectionCount ?? 0) + record.connectionCount,
    totalBytesUploaded:
      (existing?.totalBytesUploaded ?? 0) + record.totalBytesUploaded,
    totalBytesDownloaded:
      (existing?.totalBytesDownloaded ?? 0) + record.totalBytesDownloaded,
  };
}

/**
 * Validate already-parsed JSON as a snapshot.
 *
 * @param data - Parsed JSON
 * @param source - Label used in error messages
 * @throws Error listing every validation issue
 */
export function parseSnapshot(data: unknown, source: string): LoadedSnapshot {
  try {
    return toMonitoringSnapshot(SnapshotFileSchema.parse(data));
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new Error(formatValidationError(error, source));
    }
    throw error;
  }
}

/**
 * Read and validate a snapshot file.
 *
 * @throws Error if the file is unreadable, not JSON, or fails validation
 */
export function loadSnapshot(filePath: string): LoadedSnapshot {
  let contents: string;
  try {
    contents = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new Error(
      `Failed to read snapshot ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(contents);
  } catch (error) {
    throw new Error(
      `Failed to parse snapshot ${filePath} as JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseSnapshot(data, filePath);
}
