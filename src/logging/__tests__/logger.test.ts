import { describe, expect, it, vi } from 'vitest';
import { createDebugSink, noopDebug } from '../logger.js';

describe('createDebugSink', () => {
  it('does nothing outside debug mode', () => {
    const logger = { debug: vi.fn() };

    const sink = createDebugSink({ debug: false }, logger);
    sink('prompt text', 'EXTRACT-PROMPT= ');

    expect(sink).toBe(noopDebug);
    expect(logger.debug).not.toHaveBeenCalled();
  });

  it('logs the labeled text in debug mode', () => {
    const logger = { debug: vi.fn() };

    createDebugSink({ debug: true }, logger)('prompt text', 'EXTRACT-PROMPT= ');

    expect(logger.debug).toHaveBeenCalledWith({ label: 'EXTRACT-PROMPT=' }, 'EXTRACT-PROMPT= prompt text');
  });
});
