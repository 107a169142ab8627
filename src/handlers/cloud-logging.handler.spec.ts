import pino from 'pino';
import { setTimeout as delay } from 'timers/promises';
import { LoggerConfig } from '../interfaces';
import { CloudLoggingHandler } from './cloud-logging.handler';

const T0 = '2024-05-01T10:00:00.000Z';
const T1 = '2024-05-01T10:00:01.000Z';
const T2 = '2024-05-01T10:00:02.000Z';

describe('CloudLoggingHandler', () => {
    let lines: string[];
    let onError: jest.Mock;

    const createHandler = (config: LoggerConfig = {}) => new CloudLoggingHandler({
        PROJECT_ID: 'my-proj',
        DESTINATION: { write: (line: string) => { lines.push(line); } },
        ON_ERROR: onError,
        ...config
    });

    beforeEach(() => {
        lines = [];
        onError = jest.fn();
    });

    describe('without a request context', () => {
        it('should write the message as plain text', () => {
            const handler = createHandler();

            handler.emit({ level: 30, message: 'hello' });

            expect(lines).toEqual(['hello\n']);
        });

        it('should not touch an unregistered RequestLogs', () => {
            const handler = createHandler();
            const logs = handler.createRequestLogs({ url: 'https://x/y', headers: {} });

            handler.emit({ level: 50, message: 'boom' });

            expect(logs.isEmpty).toBe(true);
            expect(logs.severity).toBe('DEBUG');
            expect(lines).toEqual(['boom\n']);
        });

        it('should append structured fields and the error stack', () => {
            const handler = createHandler();

            handler.emit({ level: 30, message: 'created', userId: 'u1' });
            handler.emit({
                level: 50,
                message: 'failed',
                err: { type: 'Error', message: 'x', stack: 'Error: x\n    at run' }
            });

            expect(lines).toEqual([
                'created {"userId":"u1"}\n',
                'failed\nError: x\n    at run\n'
            ]);
        });

        it('should write a JSON entry when structured passthrough is on', () => {
            const handler = createHandler({ STRUCTURED_PASSTHROUGH: true });

            handler.emit({ level: 40, message: 'careful', name: 'app', pid: 4242, time: T0 });

            expect(lines).toEqual([
                '{"severity":"WARNING","name":"app","process":4242,"message":"careful","timestamp":"2024-05-01T10:00:00.000Z"}\n'
            ]);
        });
    });

    describe('flush', () => {
        it('should aggregate every line of the request into one entry', () => {
            const handler = createHandler();

            handler.store.run(() => {
                handler.setRequest(handler.createRequestLogs({ url: 'https://x/y', headers: {} }));
                handler.emit({ level: 30, message: 'a', time: T0 });
                handler.emit({ level: 30, message: 'b', time: T1 });
                handler.emit({ level: 30, message: 'c', time: T2 });

                expect(lines).toEqual([]);
                handler.flush();
            });

            expect(lines).toHaveLength(1);
            expect(JSON.parse(lines[0])).toEqual({
                severity: 'INFO',
                name: 'root',
                process: process.pid,
                url: 'https://x/y',
                message: `\n${T0}\tINFO\ta\n${T1}\tINFO\tb\n${T2}\tINFO\tc`
            });
        });

        it('should report the highest severity seen', () => {
            const handler = createHandler();

            handler.store.run(() => {
                handler.setRequest(handler.createRequestLogs({ url: '/', headers: {} }));
                handler.emit({ level: 30, message: 'info', time: T0 });
                handler.emit({ level: 50, message: 'error', time: T0 });
                handler.emit({ level: 20, message: 'debug', time: T0 });
                handler.flush();
            });

            expect(JSON.parse(lines[0]).severity).toBe('ERROR');
        });

        it('should include trace and span ids from the trace header', () => {
            const handler = createHandler();

            handler.store.run(() => {
                handler.setRequest(handler.createRequestLogs({
                    url: 'https://x/y',
                    headers: { 'x-cloud-trace-context': '105445aa7843bc8bf206b120001000/1;o=1' }
                }));
                handler.emit({ level: 30, message: 'traced', name: 'api', time: T0 });
                handler.flush();
            });

            expect(lines[0]).toBe(
                `{"severity":"INFO","name":"api","process":${process.pid},"url":"https://x/y",` +
                '"logging.googleapis.com/trace":"projects/my-proj/traces/105445aa7843bc8bf206b120001000",' +
                '"logging.googleapis.com/spanId":"1",' +
                `"message":"\\n${T0}\\tINFO\\ttraced"}\n`
            );
        });

        it('should take the project from GCP_PROJECT when not configured', () => {
            const previous = process.env.GCP_PROJECT;
            process.env.GCP_PROJECT = 'env-proj';
            try {
                const handler = createHandler({ PROJECT_ID: undefined });
                expect(handler.project).toBe('env-proj');
            } finally {
                if (previous === undefined) {
                    delete process.env.GCP_PROJECT;
                } else {
                    process.env.GCP_PROJECT = previous;
                }
            }
        });

        it('should be a no-op the second time', () => {
            const handler = createHandler();

            handler.store.run(() => {
                handler.setRequest(handler.createRequestLogs({ url: '/', headers: {} }));
                handler.emit({ level: 30, message: 'once', time: T0 });
                handler.flush();
                expect(() => handler.flush()).not.toThrow();
            });

            expect(lines).toHaveLength(1);
        });

        it('should be a no-op outside a request', () => {
            const handler = createHandler();

            expect(() => handler.flush()).not.toThrow();
            expect(lines).toEqual([]);
        });

        it('should write nothing for a request without log lines but still clear it', () => {
            const handler = createHandler();

            handler.store.run(() => {
                handler.setRequest(handler.createRequestLogs({ url: '/', headers: {} }));
                handler.flush();
                expect(handler.getRequest()).toBeNull();
            });

            expect(lines).toEqual([]);
        });

        it('should send later lines straight to the destination', () => {
            const handler = createHandler();

            handler.store.run(() => {
                handler.setRequest(handler.createRequestLogs({ url: '/', headers: {} }));
                handler.emit({ level: 30, message: 'inside', time: T0 });
                handler.flush();
                handler.emit({ level: 30, message: 'after' });
            });

            expect(lines).toHaveLength(2);
            expect(lines[1]).toBe('after\n');
        });

        it('should keep concurrent requests apart', async () => {
            const handler = createHandler();

            const handle = (name: string, pause: number) => handler.store.run(async () => {
                handler.setRequest(handler.createRequestLogs({ url: `/${name}`, headers: {} }));
                for (let i = 0; i < 3; i++) {
                    await delay(pause);
                    handler.emit({ level: 30, message: `${name}${i}`, time: T0 });
                }
                handler.flush();
            });

            await Promise.all([handle('a', 3), handle('b', 2)]);

            const entries = lines.map(line => JSON.parse(line));
            const byUrl = Object.fromEntries(entries.map(entry => [entry.url, entry.message]));

            expect(entries).toHaveLength(2);
            expect(byUrl['/a']).toBe(`\n${T0}\tINFO\ta0\n${T0}\tINFO\ta1\n${T0}\tINFO\ta2`);
            expect(byUrl['/b']).toBe(`\n${T0}\tINFO\tb0\n${T0}\tINFO\tb1\n${T0}\tINFO\tb2`);
        });

        it('should keep a background request from taking over the one that spawned it', async () => {
            const handler = createHandler();

            await handler.store.run(async () => {
                handler.setRequest(handler.createRequestLogs({ url: '/req', headers: {} }));
                handler.emit({ level: 30, message: 'req-1', time: T0 });

                const background = (async () => {
                    await delay(1);
                    handler.setRequest(handler.createRequestLogs({ url: '/bg', headers: {} }));
                    handler.emit({ level: 30, message: 'bg-1', time: T0 });
                    await delay(5);
                    handler.flush();
                })();

                await delay(3);
                handler.emit({ level: 30, message: 'req-2', time: T0 });
                await background;
                handler.emit({ level: 30, message: 'req-3', time: T0 });
                handler.flush();
            });

            expect(lines.map(line => JSON.parse(line)).map(entry => [entry.url, entry.message])).toEqual([
                ['/bg', `\n${T0}\tINFO\tbg-1`],
                ['/req', `\n${T0}\tINFO\treq-1\n${T0}\tINFO\treq-2\n${T0}\tINFO\treq-3`]
            ]);
        });

        it('should write once when another task already flushed the request', async () => {
            const handler = createHandler();

            await handler.store.run(async () => {
                handler.setRequest(handler.createRequestLogs({ url: '/', headers: {} }));
                handler.emit({ level: 30, message: 'handled', time: T0 });

                await new Promise<void>(resolve => setImmediate(() => {
                    handler.flush();
                    resolve();
                }));

                expect(handler.getRequest()?.isFlushed).toBe(true);
                handler.emit({ level: 30, message: 'late' });
                handler.flush();
            });

            expect(lines).toHaveLength(2);
            expect(JSON.parse(lines[0]).message).toBe(`\n${T0}\tINFO\thandled`);
            expect(lines[1]).toBe('late\n');
        });

        it('should call back pino flush callbacks', async () => {
            const handler = createHandler();
            const logger = pino({ messageKey: 'message' }, handler);

            await handler.store.run(async () => {
                handler.setRequest(handler.createRequestLogs({ url: '/', headers: {} }));
                logger.info('before shutdown');
                await new Promise<void>((resolve, reject) =>
                    logger.flush(err => (err ? reject(err) : resolve())));
            });
            await new Promise<void>(resolve => logger.flush(() => resolve()));

            expect(lines).toHaveLength(1);
            expect(JSON.parse(lines[0]).message).toMatch(/\tINFO\tbefore shutdown$/);
        });
    });

    describe('encoder', () => {
        const flushOne = (handler: CloudLoggingHandler) => handler.store.run(() => {
            handler.setRequest(handler.createRequestLogs({
                url: 'https://x/y',
                headers: { 'x-cloud-trace-context': 'abc/2' }
            }));
            handler.emit({ level: 40, message: 'w', time: T0 });
            handler.flush();
        });

        it('should only change the byte form with a custom encoder', () => {
            const dumps = jest.fn((value: unknown) => JSON.stringify(value, null, 2));
            flushOne(createHandler());
            flushOne(createHandler({ JSON_IMPL: { dumps } }));

            expect(dumps).toHaveBeenCalledTimes(1);
            expect(lines[1]).not.toBe(lines[0]);
            expect(JSON.parse(lines[1])).toEqual(JSON.parse(lines[0]));
        });

        it('should fall back to a degraded entry when the encoder throws', () => {
            const handler = createHandler({
                JSON_IMPL: { dumps: () => { throw new Error('boom'); } }
            });

            expect(() => flushOne(handler)).not.toThrow();
            expect(JSON.parse(lines[0])).toEqual({
                severity: 'WARNING',
                name: 'root',
                process: process.pid,
                url: 'https://x/y',
                'logging.googleapis.com/trace': 'projects/my-proj/traces/abc',
                'logging.googleapis.com/spanId': '2',
                message: `\n${T0}\tWARNING\tw`,
                serializationError: 'Failed to serialize log entry: boom'
            });
            expect(onError).not.toHaveBeenCalled();
        });

        it('should mark structured fields it cannot encode', () => {
            const handler = createHandler();
            const circular: Record<string, unknown> = {};
            circular.self = circular;

            handler.emit({ level: 30, message: 'loop', data: circular });

            expect(lines).toEqual(['loop [unserializable fields]\n']);
        });
    });

    describe('destination failures', () => {
        it('should report write errors instead of throwing', () => {
            const failure = new Error('stream closed');
            const handler = createHandler({
                DESTINATION: { write: () => { throw failure; } }
            });

            expect(() => handler.emit({ level: 30, message: 'lost' })).not.toThrow();
            expect(onError).toHaveBeenCalledWith(failure);

            handler.store.run(() => {
                handler.setRequest(handler.createRequestLogs({ url: '/', headers: {} }));
                handler.emit({ level: 30, message: 'lost too' });
                expect(() => handler.flush()).not.toThrow();
                expect(handler.getRequest()).toBeNull();
            });

            expect(onError).toHaveBeenCalledTimes(2);
        });
    });

    describe('write', () => {
        it('should parse pino lines into records', () => {
            const handler = createHandler();

            handler.write(`{"level":40,"time":"${T0}","pid":1,"name":"svc","message":"slow","ms":120}\n`);

            expect(lines).toEqual(['slow {"ms":120}\n']);
        });

        it('should treat non-JSON input as an INFO message', () => {
            const handler = createHandler();

            handler.store.run(() => {
                handler.setRequest(handler.createRequestLogs({ url: '/', headers: {} }));
                handler.write('plain text\n');
                const snapshot = handler.getRequest()?.snapshot();

                expect(snapshot?.severity).toBe('INFO');
                expect(snapshot?.message).toMatch(/^\n\S+\tINFO\tplain text$/);
            });
        });
    });

    describe('request context API', () => {
        it('should restore the previous request with resetRequest', () => {
            const handler = createHandler();
            const outer = handler.createRequestLogs({ url: '/outer', headers: {} });
            const inner = handler.createRequestLogs({ url: '/inner', headers: {} });

            handler.store.run(() => {
                handler.setRequest(outer);
                const token = handler.setRequest(inner);
                handler.emit({ level: 30, message: 'nested', time: T0 });
                handler.resetRequest(token);

                expect(handler.getRequest()).toBe(outer);
                expect(outer.isEmpty).toBe(true);
                expect(inner.isEmpty).toBe(false);
            });
        });
    });
});
