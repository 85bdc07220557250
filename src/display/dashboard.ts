/**
 * Dashboard composition: which tables go where on the screen.
 */

import type {
  HostnameMap,
  MonitoringSnapshot,
  Rect,
  ViewName,
} from '../types/monitoring.js';
import type { IDrawingSurface } from './i-drawing-surface.js';
import {
  createConnectionsTable,
  createProcessesTable,
  createRemoteAddressesTable,
} from './table-factories.js';
import type { TableModel } from './table-model.js';

/**
 * Build the table model for a view.
 */
export function createTable(
  view: ViewName,
  snapshot: MonitoringSnapshot,
  ipToHost: HostnameMap
): TableModel {
  switch (view) {
    case 'processes': {
      return createProcessesTable(snapshot);
    }
    case 'connections': {
      return createConnectionsTable(snapshot, ipToHost);
    }
    case 'remote-addresses': {
      return createRemoteAddressesTable(snapshot, ipToHost);
    }
  }
}

/**
 * Split a screen into stacked full-width regions, one per view.
 *
 * Height is divided evenly; the last region takes the remainder.
 */
export function splitVertically(
  width: number,
  height: number,
  count: number
): Rect[] {
  if (count <= 0) {
    return [];
  }
  const share = Math.floor(height / count);
  return Array.from({ length: count }, (_, index) => ({
    x: 0,
    y: index * share,
    width,
    height: index === count - 1 ? height - share * (count - 1) : share,
  }));
}

/**
 * Draw every requested view onto the surface.
 *
 * Tables are rebuilt from the snapshot each call. Views whose region ends
 * up with no height are skipped.
 */
export function renderDashboard(
  snapshot: MonitoringSnapshot,
  ipToHost: HostnameMap,
  surface: IDrawingSurface,
  size: { width: number; height: number },
  views: readonly ViewName[]
): void {
  const regions = splitVertically(size.width, size.height, views.length);

  for (const [index, view] of views.entries()) {
    const rect = regions[index];
    if (rect.height <= 0) {
      continue;
    }
    createTable(view, snapshot, ipToHost).render(surface, rect);
  }
}
