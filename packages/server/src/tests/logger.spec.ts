import { describe, it, expect, vi } from 'vitest';
import { wrapPinoLogger } from '../logger.js';

describe('wrapPinoLogger', () => {
  it('passes the message as msg alongside the metadata', () => {
    const pino = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const logger = wrapPinoLogger(pino);

    logger.info('Contact created', { contactId: 3 });
    logger.error('Contact store failure', { operation: 'list' });

    expect(pino.info).toHaveBeenCalledWith({ msg: 'Contact created', contactId: 3 });
    expect(pino.error).toHaveBeenCalledWith({ msg: 'Contact store failure', operation: 'list' });
  });

  it('handles calls without metadata', () => {
    const pino = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const logger = wrapPinoLogger(pino);

    logger.debug('Contacts listed');
    logger.warn('slow');

    expect(pino.debug).toHaveBeenCalledWith({ msg: 'Contacts listed' });
    expect(pino.warn).toHaveBeenCalledWith({ msg: 'slow' });
  });
});
