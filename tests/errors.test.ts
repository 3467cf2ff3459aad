import { describe, it, expect } from 'vitest';
import {
    PaperRenamerError,
    ConfigurationError,
    ValidationError,
    RenderError,
    GeminiAPIError,
    RetryExhaustedError,
    PlacementError,
    errorMessage,
    setCorrelationId,
} from '../src/errors/index.js';

describe('Error Classes', () => {
    describe('PaperRenamerError', () => {
        it('should create with message and code', () => {
            const error = new PaperRenamerError('Test error', 'TEST_CODE');
            expect(error.message).toBe('Test error');
            expect(error.name).toBe('PaperRenamerError');
            expect(error.code).toBe('TEST_CODE');
        });

        it('should take the current correlation ID', () => {
            setCorrelationId('prn_fixed');
            const error = new PaperRenamerError('Test error', 'TEST');
            expect(error.correlationId).toBe('prn_fixed');
        });

        it('should serialize to JSON', () => {
            const cause = new Error('root cause');
            const error = new PaperRenamerError('Test error', 'TEST', { key: 'value' }, {
                correlationId: 'prn_json',
                timestamp: new Date('2024-01-02T03:04:05.000Z'),
                cause,
                operation: 'extract',
            });

            expect(error.toJSON()).toEqual({
                name: 'PaperRenamerError',
                code: 'TEST',
                message: 'Test error',
                details: { key: 'value' },
                correlationId: 'prn_json',
                timestamp: '2024-01-02T03:04:05.000Z',
                operation: 'extract',
                cause: { name: 'Error', message: 'root cause' },
            });
        });
    });

    describe('subclasses', () => {
        it('should set names and codes', () => {
            expect(new ConfigurationError('bad').code).toBe('CONFIGURATION_ERROR');
            expect(new ValidationError('bad', 'maxPages').details).toEqual({ field: 'maxPages' });
            expect(new GeminiAPIError('down', { statusCode: 503 }).statusCode).toBe(503);
            expect(new PlacementError('escape', '/tmp/x').code).toBe('PLACEMENT_ERROR');
        });

        it('should keep render failure details', () => {
            const error = new RenderError('PDF file is empty', 'empty.pdf', 'empty');

            expect(error).toBeInstanceOf(PaperRenamerError);
            expect(error.details).toEqual({ filename: 'empty.pdf', reason: 'empty' });
        });

        it('should describe exhausted retries by class and attempt count', () => {
            const cause = new Error('429 Too Many Requests');

            expect(new RetryExhaustedError('rate_limit', 3, cause).message).toBe(
                'Rate limit exceeded after 3 attempts: 429 Too Many Requests'
            );
            expect(new RetryExhaustedError('transient', 2, new Error('timeout')).message).toBe(
                'Transient error exceeded after 2 attempts: timeout'
            );
        });
    });

    describe('errorMessage', () => {
        it('should read messages from anything thrown', () => {
            expect(errorMessage(new Error('boom'))).toBe('boom');
            expect(errorMessage('plain')).toBe('plain');
            expect(errorMessage(42)).toBe('42');
        });
    });
});
