/**
 * Type definitions for the monitoring state the dashboard renders.
 *
 * These mirror what the bandwidth aggregation layer hands over on every
 * redraw. The layout engine only ever reads them.
 */

/**
 * Cumulative byte counters for one monitored entity.
 */
export interface Bandwidth {
  /** Total bytes sent over the entity's observed lifetime */
  readonly totalBytesUploaded: number;

  /** Total bytes received over the entity's observed lifetime */
  readonly totalBytesDownloaded: number;
}

/**
 * Transport protocol of a connection.
 */
export type Protocol = 'tcp' | 'udp';

/**
 * A single local-to-remote socket pair.
 */
export interface Connection {
  readonly localPort: number;
  readonly remoteIp: string;
  readonly remotePort: number;
  readonly protocol: Protocol;
}

/**
 * Per-connection counters plus the owning process and interface.
 */
export interface ConnectionData extends Bandwidth {
  readonly processName: string;
  readonly interfaceName: string;
}

/**
 * Aggregate counters for a process or a remote address.
 */
export interface NetworkData extends Bandwidth {
  /** Number of connections folded into this aggregate */
  readonly connectionCount: number;
}

/**
 * Read-only view of the monitoring state for one redraw.
 */
export interface MonitoringSnapshot {
  readonly connections: ReadonlyMap<Connection, ConnectionData>;

  /** Keyed by process name */
  readonly processes: ReadonlyMap<string, NetworkData>;

  /** Keyed by remote IP address */
  readonly remoteAddresses: ReadonlyMap<string, NetworkData>;
}

/**
 * Resolved hostnames, keyed by IP address.
 */
export type HostnameMap = ReadonlyMap<string, string>;

/**
 * A rectangular region of the terminal, in character cells.
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * The three dataset views the dashboard can show.
 */
export type ViewName = 'processes' | 'connections' | 'remote-addresses';
