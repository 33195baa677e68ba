import { describe, expect, it, vi } from 'vitest';

import {
  createNullDiagnosticsPort,
  createRecordingDiagnosticsPort,
  DiagnosticCategories,
  formatRenderingScope,
  formatSnapshotScope,
} from './diagnostics.js';

describe('instrumentation/diagnostics', () => {
  it('formats snapshot and rendering scopes consistently', () => {
    expect(formatSnapshotScope('previous')).toBe('deck-source:previous');
    expect(formatSnapshotScope('next')).toBe('deck-source:next');
    expect(formatRenderingScope('f1a2')).toBe('rendering:f1a2');
  });

  it('exposes stable diagnostic categories', () => {
    expect(DiagnosticCategories.deckSourceGit).toBe('deck-source.git');
    expect(DiagnosticCategories.rendering).toBe('rendering');
  });

  it('provides a noop diagnostics port', () => {
    const port = createNullDiagnosticsPort();
    const spy = vi.spyOn(port, 'emit');
    const event = { level: 'info', message: 'noop test' } as const;

    port.emit(event);

    expect(spy).toHaveBeenCalledWith(event);
  });

  it('records emitted events in order', () => {
    const port = createRecordingDiagnosticsPort();

    port.emit({ level: 'warn', message: 'first' });
    port.emit({ level: 'error', message: 'second', code: 'X' });

    expect(port.events.map((event) => event.message)).toEqual(['first', 'second']);
  });
});
