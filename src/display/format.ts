/**
 * Cell text formatting for the bandwidth tables.
 */

import type {
  Bandwidth,
  Connection,
  HostnameMap,
} from '../types/monitoring.js';

/**
 * Human-scaled byte rate.
 *
 * Uses decimal units with two decimals above 999 bytes, e.g. `1.50KBps`.
 *
 * @returns Rate with unit suffix
 */
export function formatBandwidth(bytes: number): string {
  if (bytes > 999_999_999) {
    return `${(bytes / 1_000_000_000).toFixed(2)}GBps`;
  }
  if (bytes > 999_999) {
    return `${(bytes / 1_000_000).toFixed(2)}MBps`;
  }
  if (bytes > 999) {
    return `${(bytes / 1000).toFixed(2)}KBps`;
  }
  return `${bytes}Bps`;
}

/**
 * The "Rate Up / Down" cell.
 */
export function displayUploadAndDownload(bandwidth: Bandwidth): string {
  return `${formatBandwidth(bandwidth.totalBytesUploaded)} / ${formatBandwidth(bandwidth.totalBytesDownloaded)}`;
}

/**
 * Hostname for an address when one was resolved, the address otherwise.
 */
export function displayIpOrHost(ip: string, ipToHost: HostnameMap): string {
  return ipToHost.get(ip) ?? ip;
}

/**
 * Connection description, e.g. `<eth0>:443 => example.test:51000 (tcp)`.
 */
export function displayConnectionString(
  connection: Connection,
  ipToHost: HostnameMap,
  interfaceName: string
): string {
  const remote = displayIpOrHost(connection.remoteIp, ipToHost);
  return `<${interfaceName}>:${connection.localPort} => ${remote}:${connection.remotePort} (${connection.protocol})`;
}
