import * as net from 'net';
import { PltxReader } from '../pltx/reader.js';
import type { SignalCursor } from '../pltx/cursor.js';
import { LookupError, OpenError, PltxError, errorMessage } from '../pltx/errors.js';
import type { PltxLogger } from '../pltx/types.js';
import { SignalCatalog } from '../catalog/signal-catalog.js';
import { StreamingSession, type SessionOutcome, type StreamChannel, type StreamMessage } from './session.js';
import type { PluginConfig } from './config.js';

export const RPC_ERRORS = {
    PARSE_ERROR: -32700,
    INVALID_REQUEST: -32600,
    METHOD_NOT_FOUND: -32601,
    INVALID_PARAMS: -32602,
    INTERNAL_ERROR: -32603,
    OPEN_FAILED: -32001,
    UNKNOWN_READER: -32002,
    UNKNOWN_SIGNAL: -32004,
    STREAM_FAILED: -32005,
} as const;

export type RpcId = string | number | null;

export interface RpcRequest {
    id: RpcId;
    method: string;
    params: Record<string, unknown>;
}

export interface RpcErrorBody {
    code: number;
    message: string;
    data?: Record<string, unknown>;
}

export type RpcResponse =
    | { jsonrpc: '2.0'; id: RpcId; result: unknown }
    | { jsonrpc: '2.0'; id: RpcId; error: RpcErrorBody };

export interface PltxDaemonOptions {
    logger?: PltxLogger | null;
    catalog?: SignalCatalog;
}

class RpcError extends PltxError {
    constructor(public readonly code: number, message: string, public readonly data?: Record<string, unknown>) {
        super(message);
        this.name = 'RpcError';
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRpcId(value: unknown): value is RpcId {
    return value === null || typeof value === 'string' || typeof value === 'number';
}

function parseRequest(value: unknown): RpcRequest | null {
    if (!isRecord(value)) return null;
    const { method, params, id } = value;
    if (typeof method !== 'string' || method.length === 0) return null;
    if (params !== undefined && !isRecord(params)) return null;
    return { id: isRpcId(id) ? id : null, method, params: params ?? {} };
}

function stringParam(params: Record<string, unknown>, key: string): string {
    const v = params[key];
    if (typeof v !== 'string' || v.length === 0) {
        throw new RpcError(RPC_ERRORS.INVALID_PARAMS, `params.${key} must be a non-empty string`);
    }
    return v;
}

function toIsoTimestamp(epochSeconds: number): string | null {
    if (!(epochSeconds > 0)) return null;
    const date = new Date(epochSeconds * 1000);
    return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

function encodeLine(value: unknown): string {
    return JSON.stringify(value) + '\n';
}

/**
 * Stream channel over one client socket: one JSON message per line,
 * honouring the socket's write backpressure.
 */
class SocketChannel implements StreamChannel {
    constructor(private readonly socket: net.Socket, private readonly requestId: RpcId) { }

    get closed(): boolean {
        return this.socket.destroyed || !this.socket.writable;
    }

    async send(message: StreamMessage): Promise<void> {
        if (this.closed) throw new PltxError('Connection closed');
        if (!this.socket.write(encodeLine(message))) {
            await this.waitForDrain();
        }
    }

    private waitForDrain(): Promise<void> {
        return new Promise((resolve, reject) => {
            const onDrain = () => { cleanup(); resolve(); };
            const onClose = () => { cleanup(); reject(new PltxError('Connection closed')); };
            const cleanup = () => {
                this.socket.off('drain', onDrain);
                this.socket.off('close', onClose);
            };
            this.socket.on('drain', onDrain);
            this.socket.on('close', onClose);
        });
    }

    async fail(error: PltxError): Promise<void> {
        if (this.closed) return;
        const response: RpcResponse = {
            jsonrpc: '2.0',
            id: this.requestId,
            error: { code: RPC_ERRORS.STREAM_FAILED, message: error.message, data: { name: error.name } },
        };
        this.socket.end(encodeLine(response));
    }

    async close(): Promise<void> {
        if (!this.closed) this.socket.end();
    }
}

/**
 * Newline-delimited JSON-RPC 2.0 server exposing open-file, reader
 * inspection and per-signal streaming.
 *
 * A `fetch` request turns its connection into a stream: every following
 * line is a stream message, and the server ends the connection after the
 * `end_flag` message or the failure response.
 */
export class PltxDaemon {
    private readonly server: net.Server;
    private readonly catalog: SignalCatalog;
    private readonly logger: PltxLogger | null;
    private readonly sockets = new Set<net.Socket>();
    private readonly sessions = new Set<Promise<SessionOutcome | void>>();
    private readonly inflight = new Set<Promise<void>>();

    constructor(private readonly config: PluginConfig, options: PltxDaemonOptions = {}) {
        this.logger = options.logger ?? null;
        this.catalog = options.catalog ?? new SignalCatalog(this.logger);
        this.server = net.createServer((socket) => this.handleConnection(socket));
    }

    get signals(): SignalCatalog {
        return this.catalog;
    }

    /** Bound address; the port is the real one after start(). */
    get address(): { host: string; port: number } {
        return { host: this.config.connection.ip, port: this.config.connection.port };
    }

    async start(): Promise<void> {
        const { ip, port } = this.config.connection;
        await new Promise<void>((resolve, reject) => {
            const onError = (err: Error) => reject(err);
            this.server.once('error', onError);
            this.server.listen(port, ip, () => {
                this.server.off('error', onError);
                resolve();
            });
        });

        const bound = this.server.address();
        if (bound !== null && typeof bound === 'object') {
            this.config.connection.port = bound.port;
        }
        this.logger?.info?.(`Server initialized on ${ip}:${this.config.connection.port}`);
    }

    async stop(): Promise<void> {
        const closed = new Promise<void>((resolve) => this.server.close(() => resolve()));
        for (const socket of this.sockets) socket.destroy();
        // Requests already running may still register readers or start sessions.
        await Promise.allSettled(Array.from(this.inflight));
        await Promise.allSettled(Array.from(this.sessions));
        await closed;
        await this.catalog.clear();
        this.logger?.info?.('Server stopped.');
    }

    private handleConnection(socket: net.Socket): void {
        let buffer = '';
        let streaming = false;
        let queue: Promise<void> = Promise.resolve();

        this.sockets.add(socket);
        // Multi-byte characters may span TCP chunks.
        socket.setEncoding('utf8');
        socket.on('close', () => this.sockets.delete(socket));
        socket.on('error', (err) => this.logger?.debug?.(`Socket error: ${err.message}`));

        const processLine = async (line: string): Promise<void> => {
            if (streaming || socket.destroyed) return;

            let decoded: unknown;
            try {
                decoded = JSON.parse(line);
            } catch {
                this.reply(socket, null, new RpcError(RPC_ERRORS.PARSE_ERROR, 'Parse error'));
                return;
            }

            const request = parseRequest(decoded);
            if (!request) {
                const id = isRecord(decoded) && isRpcId(decoded.id) ? decoded.id : null;
                this.reply(socket, id, new RpcError(RPC_ERRORS.INVALID_REQUEST, 'Invalid Request'));
                return;
            }

            if (request.method === 'fetch') {
                streaming = await this.startStream(socket, request);
                return;
            }

            try {
                const result = await this.handleRequest(request);
                this.write(socket, { jsonrpc: '2.0', id: request.id, result });
            } catch (e) {
                this.reply(socket, request.id, e);
            }
        };

        socket.on('data', (data: string) => {
            buffer += data;
            const lines = buffer.split('\n');
            buffer = lines.pop() ?? '';

            for (const line of lines) {
                const trimmed = line.trim();
                if (!trimmed) continue;
                const task = queue.then(() => processLine(trimmed)).catch((e: unknown) => {
                    this.logger?.error?.(`Request handling failed: ${errorMessage(e)}`);
                });
                queue = task;
                this.inflight.add(task);
                void task.finally(() => this.inflight.delete(task));
            }
        });
    }

    private write(socket: net.Socket, response: RpcResponse): void {
        if (!socket.destroyed && socket.writable) socket.write(encodeLine(response));
    }

    private reply(socket: net.Socket, id: RpcId, err: unknown): void {
        this.write(socket, { jsonrpc: '2.0', id, error: this.toErrorBody(err) });
    }

    private toErrorBody(err: unknown): RpcErrorBody {
        if (err instanceof RpcError) {
            return err.data ? { code: err.code, message: err.message, data: err.data } : { code: err.code, message: err.message };
        }
        if (err instanceof OpenError) {
            return { code: RPC_ERRORS.OPEN_FAILED, message: err.message, data: { kind: err.kind } };
        }
        if (err instanceof LookupError) {
            return { code: RPC_ERRORS.UNKNOWN_SIGNAL, message: err.message };
        }
        return { code: RPC_ERRORS.INTERNAL_ERROR, message: errorMessage(err) || 'Internal error' };
    }

    /**
     * Resolves the signal before anything is streamed; an unknown name is a
     * plain error response and the connection stays a request connection.
     */
    private async startStream(socket: net.Socket, request: RpcRequest): Promise<boolean> {
        let cursor: SignalCursor;
        try {
            const signal = stringParam(request.params, 'signal');
            const entry = this.catalog.resolve(signal);
            cursor = entry.reader.openCursor(entry.internalName);
        } catch (e) {
            this.logger?.error?.(`Signal not found: ${errorMessage(e)}`);
            this.reply(socket, request.id, e);
            return false;
        }

        const session = new StreamingSession(cursor, new SocketChannel(socket, request.id), this.logger);
        const running = session.run().catch((e: unknown) => {
            this.logger?.error?.(`Stream for ${cursor.signalName} aborted: ${errorMessage(e)}`);
            socket.destroy();
        });
        this.sessions.add(running);
        void running.finally(() => this.sessions.delete(running));
        return true;
    }

    private async handleRequest(request: RpcRequest): Promise<unknown> {
        const { method, params } = request;

        switch (method) {
            case 'ping':
                return { pong: true };

            case 'health':
                return { status: 'ok' };

            case 'info':
                return {
                    name: this.config.name,
                    id: this.config.id,
                    version: this.config.version,
                    description: this.config.description,
                    file_formats: this.config.file_formats,
                    connection: { ...this.config.connection },
                };

            case 'read_file':
                return this.readFile(params);

            case 'readers':
                return this.catalog.listReaders().map((r) => ({
                    id: r.id,
                    path: r.path,
                    signals_count: r.signalsCount,
                    headers: r.headers,
                }));

            case 'reader_headers': {
                const id = stringParam(params, 'id');
                return { id, headers: this.readerSignals(id) };
            }

            case 'close_reader': {
                const id = stringParam(params, 'id');
                this.readerSignals(id);
                await this.catalog.closeReader(id);
                return { closed: true };
            }

            default:
                throw new RpcError(RPC_ERRORS.METHOD_NOT_FOUND, `Method not found: ${method}`);
        }
    }

    private readerSignals(id: string): string[] {
        try {
            return this.catalog.readerSignals(id);
        } catch (e) {
            throw new RpcError(RPC_ERRORS.UNKNOWN_READER, errorMessage(e));
        }
    }

    private async readFile(params: Record<string, unknown>): Promise<unknown> {
        const filePath = stringParam(params, 'path');
        const mode = params.mode ?? 'offline';
        if (mode !== 'offline') {
            throw new RpcError(RPC_ERRORS.INVALID_PARAMS, `Unsupported mode: ${String(mode)}`);
        }
        this.logger?.debug?.(`Reading file: mode=${mode}, path=${filePath}`);

        let reader: PltxReader;
        try {
            reader = await PltxReader.open(filePath, {
                lockTimeoutMs: this.config.lockTimeoutMs,
                logger: this.logger,
            });
        } catch (e) {
            this.logger?.error?.(`Failed to open file ${filePath}: ${errorMessage(e)}`);
            throw e;
        }

        // The catalog holds the reader from here on.
        const registered = this.catalog.registerReader(reader);
        await reader.release();

        return {
            id: registered.readerId,
            name: reader.displayName,
            path: filePath,
            source: filePath,
            headers: registered.publicNames,
            desc: null,
            tags: null,
            created_at: toIsoTimestamp(reader.header.created),
            source_url: null,
        };
    }
}
