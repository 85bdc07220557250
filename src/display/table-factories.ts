/**
 * Builders for the three dashboard tables.
 *
 * Each builder ranks its slice of the snapshot by bandwidth, formats the
 * cells and attaches breakpoints tuned to how wide that data usually is.
 */

import { BreakpointTable } from '../layout/column-layout.js';
import { rankByBandwidth } from '../layout/rank.js';
import type {
  HostnameMap,
  MonitoringSnapshot,
} from '../types/monitoring.js';
import {
  displayConnectionString,
  displayIpOrHost,
  displayUploadAndDownload,
} from './format.js';
import { TableModel } from './table-model.js';

export const CONNECTIONS_TITLE = 'Utilization by connection';
export const PROCESSES_TITLE = 'Utilization by process name';
export const REMOTE_ADDRESSES_TITLE = 'Utilization by remote address';

const RATE_COLUMN = 'Rate Up / Down';

/**
 * Breakpoints shared by the connections and remote-address tables, whose
 * first column holds long host strings.
 */
function wideFirstColumnBreakpoints(baseWidths: readonly number[]): BreakpointTable {
  return new BreakpointTable({ columnCount: 'two', columnWidths: baseWidths })
    .set(70, { columnCount: 'three', columnWidths: [30, 12, 23] })
    .set(100, { columnCount: 'three', columnWidths: [60, 12, 23] })
    .set(140, { columnCount: 'three', columnWidths: [100, 12, 23] });
}

export function createConnectionsTable(
  snapshot: MonitoringSnapshot,
  ipToHost: HostnameMap
): TableModel {
  const rows = rankByBandwidth(snapshot.connections).map(
    ([connection, data]) => [
      displayConnectionString(connection, ipToHost, data.interfaceName),
      data.processName,
      displayUploadAndDownload(data),
    ]
  );

  return new TableModel(
    CONNECTIONS_TITLE,
    ['Connection', 'Process', RATE_COLUMN],
    rows,
    wideFirstColumnBreakpoints([20, 23])
  );
}

export function createProcessesTable(snapshot: MonitoringSnapshot): TableModel {
  const rows = rankByBandwidth(snapshot.processes).map(
    ([processName, data]) => [
      processName,
      String(data.connectionCount),
      displayUploadAndDownload(data),
    ]
  );

  const breakpoints = new BreakpointTable({
    columnCount: 'two',
    columnWidths: [12, 23],
  })
    .set(50, { columnCount: 'three', columnWidths: [12, 12, 23] })
    .set(100, { columnCount: 'three', columnWidths: [40, 12, 23] })
    .set(140, { columnCount: 'three', columnWidths: [40, 12, 23] });

  return new TableModel(
    PROCESSES_TITLE,
    ['Process', 'Connections', RATE_COLUMN],
    rows,
    breakpoints
  );
}

export function createRemoteAddressesTable(
  snapshot: MonitoringSnapshot,
  ipToHost: HostnameMap
): TableModel {
  const rows = rankByBandwidth(snapshot.remoteAddresses).map(
    ([address, data]) => [
      displayIpOrHost(address, ipToHost),
      String(data.connectionCount),
      displayUploadAndDownload(data),
    ]
  );

  return new TableModel(
    REMOTE_ADDRESSES_TITLE,
    ['Remote Address', 'Connections', RATE_COLUMN],
    rows,
    wideFirstColumnBreakpoints([12, 23])
  );
}
