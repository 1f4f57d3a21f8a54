import type http from 'http';
import type { ServerListSource } from '../../src/discovery/types';
import type { Server } from '../../src/servers/types';

export interface Deferred<T> {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (error: Error) => void;
}

export function deferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => undefined;
    let reject: (error: Error) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

/** Source whose answers are scripted call by call; the last answer repeats. */
export class ScriptedSource implements ServerListSource {
    name = 'scripted';
    calls = 0;
    signals: Array<AbortSignal | undefined> = [];

    constructor(private readonly answers: Array<() => Promise<Server[]>>) {}

    getServers(signal?: AbortSignal): Promise<Server[]> {
        this.signals.push(signal);
        const answer = this.answers[Math.min(this.calls, this.answers.length - 1)];
        this.calls++;
        return answer();
    }
}

export function fixedSource(servers: Server[]): ScriptedSource {
    return new ScriptedSource([async () => [...servers]]);
}

export interface Listening {
    server: http.Server;
    port: number;
    close: () => Promise<void>;
}

/** Listen on an ephemeral loopback port. */
export function listen(app: { listen: (port: number, host: string) => http.Server }): Promise<Listening> {
    return new Promise((resolve, reject) => {
        const server = app.listen(0, '127.0.0.1');
        server.once('error', reject);
        server.once('listening', () => {
            const address = server.address();
            if (address === null || typeof address === 'string') {
                reject(new Error('expected a TCP address'));
                return;
            }
            const { port } = address;
            resolve({
                server,
                port,
                close: () => new Promise<void>((done) => {
                    server.closeAllConnections();
                    server.close(() => done());
                }),
            });
        });
    });
}
