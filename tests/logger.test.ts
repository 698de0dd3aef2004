/**
 * Tests for the levelled logger
 */

import { createLogger, silentLogger } from '../src/logger.js';

describe('createLogger', () => {
    test('formats lines with timestamp, level and scope', () => {
        const sink = jest.fn();
        createLogger('info', 'taxonomy', sink).info('Loaded model');

        expect(sink).toHaveBeenCalledTimes(1);
        expect(sink.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] INFO \[taxonomy\] Loaded model$/);
    });

    test('drops messages below the threshold', () => {
        const sink = jest.fn();
        const logger = createLogger('warn', undefined, sink);

        logger.debug('hidden');
        logger.info('hidden');
        logger.warn('shown');
        logger.error('shown too');

        expect(sink).toHaveBeenCalledTimes(2);
        expect(sink.mock.calls[0][0]).toMatch(/ WARN shown$/);
        expect(sink.mock.calls[1][0]).toMatch(/ ERROR shown too$/);
    });

    test('child loggers nest scopes and pass details through', () => {
        const sink = jest.fn();
        const error = new Error('boom');
        createLogger('debug', 'server', sink).child('http').error('Request failed', error);

        expect(sink.mock.calls[0][0]).toMatch(/ ERROR \[server:http\] Request failed$/);
        expect(sink.mock.calls[0][1]).toBe(error);
    });

    test('writes to stderr by default', () => {
        const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        createLogger('info').info('hello');
        expect(spy).toHaveBeenCalledTimes(1);
        spy.mockRestore();
    });

    test('silentLogger writes nothing', () => {
        const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        silentLogger.error('nothing to see');
        silentLogger.child('x').warn('still nothing');
        expect(spy).not.toHaveBeenCalled();
        spy.mockRestore();
    });
});
