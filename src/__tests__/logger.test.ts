import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// Capture the options passed to pino
let capturedOptions: Record<string, unknown> | undefined;
let capturedTransport: Record<string, unknown> | undefined;

const { mockChild } = vi.hoisted(() => ({
  mockChild: vi.fn((_bindings: object, opts: { level: string }) => ({ level: opts.level })),
}));

vi.mock('pino', () => {
  const mockPino = vi.fn((opts: Record<string, unknown>) => {
    capturedOptions = opts;
    if (opts?.transport) {
      capturedTransport = opts.transport as Record<string, unknown>;
    }
    return { level: opts?.level ?? 'info', child: mockChild };
  });
  return { default: Object.assign(mockPino, { destination: vi.fn(() => 'mock-destination') }) };
});

describe('logger', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    vi.resetModules();
    mockChild.mockClear();
    capturedOptions = undefined;
    capturedTransport = undefined;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  describe('getLogLevel (via pino config)', () => {
    it('defaults to info when LOG_LEVEL is not set', async () => {
      delete process.env.LOG_LEVEL;
      await import('../logger.js');
      expect(capturedOptions?.level).toBe('info');
    });

    it('returns valid level when LOG_LEVEL=debug', async () => {
      process.env.LOG_LEVEL = 'debug';
      await import('../logger.js');
      expect(capturedOptions?.level).toBe('debug');
    });

    it('ignores invalid level (LOG_LEVEL=loud falls back to info)', async () => {
      process.env.LOG_LEVEL = 'loud';
      await import('../logger.js');
      expect(capturedOptions?.level).toBe('info');
    });

    it('is case-insensitive (LOG_LEVEL=WARN returns warn)', async () => {
      process.env.LOG_LEVEL = 'WARN';
      await import('../logger.js');
      expect(capturedOptions?.level).toBe('warn');
    });
  });

  describe('transport', () => {
    it('writes JSON to stderr outside development', async () => {
      process.env.NODE_ENV = 'production';
      const pino = (await import('pino')).default;
      await import('../logger.js');
      expect(capturedTransport).toBeUndefined();
      expect(pino.destination).toHaveBeenCalledWith(2);
    });
  });

  describe('logger instance', () => {
    it('tags every line with the service name', async () => {
      await import('../logger.js');
      const base = capturedOptions?.base as Record<string, string> | undefined;
      expect(base?.service).toBe('tube-trail');
    });

    it('configures level formatter to return label', async () => {
      await import('../logger.js');
      const formatters = capturedOptions?.formatters as
        | { level: (label: string) => Record<string, string> }
        | undefined;
      expect(formatters?.level('info')).toEqual({ level: 'info' });
    });
  });

  describe('createRunContext', () => {
    it('uses the shared logger when not verbose', async () => {
      const { createRunContext, logger } = await import('../logger.js');
      const ctx = createRunContext(false);

      expect(ctx.verbose).toBe(false);
      expect(ctx.logger).toBe(logger);
      expect(mockChild).not.toHaveBeenCalled();
    });

    it('derives a debug-level child when verbose', async () => {
      const { createRunContext } = await import('../logger.js');
      const ctx = createRunContext(true);

      expect(ctx.verbose).toBe(true);
      expect(mockChild).toHaveBeenCalledWith({}, { level: 'debug' });
      expect(ctx.logger).toMatchObject({ level: 'debug' });
    });

    it('keeps contexts independent of each other', async () => {
      const { createRunContext } = await import('../logger.js');
      const verbose = createRunContext(true);
      const quiet = createRunContext(false);

      expect(verbose.logger).not.toBe(quiet.logger);
      expect(quiet.verbose).toBe(false);
    });
  });
});
