/**
 * Tests for dashboard composition.
 */

import {
  createTable,
  renderDashboard,
  splitVertically,
} from '../../display/dashboard.js';
import {
  CONNECTIONS_TITLE,
  PROCESSES_TITLE,
  REMOTE_ADDRESSES_TITLE,
} from '../../display/table-factories.js';
import { makeSnapshot, RecordingSurface } from '../test-helpers.js';

describe('splitVertically', () => {
  it('should give the remainder to the last region', () => {
    expect(splitVertically(100, 10, 3)).toEqual([
      { x: 0, y: 0, width: 100, height: 3 },
      { x: 0, y: 3, width: 100, height: 3 },
      { x: 0, y: 6, width: 100, height: 4 },
    ]);
  });

  it('should use the whole screen for a single view', () => {
    expect(splitVertically(80, 24, 1)).toEqual([
      { x: 0, y: 0, width: 80, height: 24 },
    ]);
  });

  it('should return no regions for no views', () => {
    expect(splitVertically(80, 24, 0)).toEqual([]);
  });
});

describe('createTable', () => {
  it.each([
    ['processes', PROCESSES_TITLE],
    ['connections', CONNECTIONS_TITLE],
    ['remote-addresses', REMOTE_ADDRESSES_TITLE],
  ] as const)('should build the %s table', (view, title) => {
    expect(createTable(view, makeSnapshot(), new Map()).title).toBe(title);
  });
});

describe('renderDashboard', () => {
  it('should draw each view in its own region', () => {
    const surface = new RecordingSurface();

    renderDashboard(
      makeSnapshot(),
      new Map(),
      surface,
      { width: 120, height: 30 },
      ['processes', 'connections']
    );

    expect(surface.calls.map(({ request, rect }) => [request.title, rect])).toEqual([
      [PROCESSES_TITLE, { x: 0, y: 0, width: 120, height: 15 }],
      [CONNECTIONS_TITLE, { x: 0, y: 15, width: 120, height: 15 }],
    ]);
  });

  it('should skip views that get no height', () => {
    const surface = new RecordingSurface();

    renderDashboard(
      makeSnapshot(),
      new Map(),
      surface,
      { width: 120, height: 1 },
      ['processes', 'connections', 'remote-addresses']
    );

    expect(surface.calls.map(({ request }) => request.title)).toEqual([
      REMOTE_ADDRESSES_TITLE,
    ]);
  });
});
