import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger } from './logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with the component and routes by level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('Ingestion', { level: 'info', json: false });

    logger.info('Upload recebido');
    logger.warn('Duplicate upload skipped', { filename: 'relatorio.pdf' });
    logger.error('Processing failed');

    expect(log).toHaveBeenCalledWith('[Ingestion] Upload recebido');
    expect(warn).toHaveBeenCalledWith('[Ingestion] Duplicate upload skipped', {
      filename: 'relatorio.pdf',
    });
    expect(error).toHaveBeenCalledWith('[Ingestion] Processing failed');
  });

  it('drops messages below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createLogger('Plans', { level: 'warn', json: false });

    logger.debug('noise');
    logger.info('noise');
    logger.warn('kept');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('writes one JSON line per entry in json mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger('Plans', { level: 'debug', json: true });

    logger.debug('Plan saved', { items: 3 });

    expect(log).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({
      level: 'debug',
      component: 'Plans',
      message: 'Plan saved',
      items: 3,
    });
  });
});
