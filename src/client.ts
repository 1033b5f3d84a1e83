// SPDX-FileCopyrightText: 2025 Anaconda, Inc
// SPDX-License-Identifier: Apache-2.0

import * as dgram from 'node:dgram';
import * as net from 'node:net';

import { XRayCommon } from './common.js'
import { Configuration, InternalConfiguration, toImpl } from './config.js'
import { XRayError, errorMessage } from './errors.js'

/**
 * Anything that can deliver a segment record to an X-Ray daemon.
 *
 * A send either completes locally or fails right away; it never waits on the
 * daemon and is never retried.
 */
export interface Client {
    send(data: unknown): Promise<void>;
    close?(): void;
}

/**
 * Parsed daemon address. `host` is always an IP literal.
 */
export interface DaemonAddress {
    host: string
    port: number
    family: 4 | 6
}

/**
 * Parses `ip:port` or `[ipv6]:port`.
 *
 * @throws {XRayError} `BAD_CONFIG` for anything else.
 */
export function parseDaemonAddress(text: string): DaemonAddress {
    const bad = (detail: string) => XRayError.badConfig(`invalid X-Ray daemon address \`${text}\`: ${detail}`)
    let host: string
    let portText: string
    if (text.startsWith('[')) {
        const close = text.indexOf(']:')
        if (close < 0) {
            throw bad('expected [ipv6]:port')
        }
        host = text.slice(1, close)
        portText = text.slice(close + 2)
    } else {
        const colon = text.lastIndexOf(':')
        if (colon < 0) {
            throw bad('expected ip:port')
        }
        host = text.slice(0, colon)
        portText = text.slice(colon + 1)
    }
    const family = net.isIP(host)
    if (family !== 4 && family !== 6) {
        throw bad(`\`${host}\` is not an IP address`)
    }
    if (family === 6 && !text.startsWith('[')) {
        throw bad('IPv6 addresses must be written as [ipv6]:port')
    }
    if (!/^\d{1,5}$/.test(portText) || Number(portText) > 65535) {
        throw bad(`\`${portText}\` is not a port number`)
    }
    return { host, port: Number(portText), family }
}

/**
 * X-Ray daemon client sending every record as one UDP datagram.
 *
 * One socket is opened per client, connected to the daemon address and shared
 * by every session using it. The socket is unref'd, so an idle client never
 * keeps the process alive.
 *
 * @example
 * ```typescript
 * const client = DaemonClient.fromLambdaEnv()
 * await client.send({ id: "70de5b6f19ff9a0a", name: "example", ... })
 * ```
 */
export class DaemonClient extends XRayCommon implements Client {
    static readonly HEADER = '{"format": "json", "version": 1}'
    static readonly DELIMITER = '\n'

    readonly address: DaemonAddress
    private readonly socket: dgram.Socket
    private readonly connected: Promise<void>

    constructor(address: DaemonAddress | string, config: Configuration | InternalConfiguration = new InternalConfiguration()) {
        super(config)
        this.address = typeof address === 'string' ? parseDaemonAddress(address) : address
        this.socket = dgram.createSocket(this.address.family === 6 ? 'udp6' : 'udp4')
        this.socket.on('error', (err) => this.warn(`X-Ray daemon socket error: ${err.message}`))
        this.socket.unref()
        this.connected = this.connect()
        void this.connected.catch((err: unknown) => this.debug(`Not connected to X-Ray daemon: ${errorMessage(err)}`))
        this.debug(`Sending segments to X-Ray daemon at ${this.address.host}:${this.address.port}.`)
    }

    // Settles once: resolved on 'connect', rejected if the socket errors or closes first.
    private connect(): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            const onError = (err: Error) => {
                this.socket.off('close', onClose)
                reject(new XRayError('IO', `failed to connect to X-Ray daemon: ${err.message}`, err))
            }
            const onClose = () => {
                this.socket.off('error', onError)
                reject(new XRayError('IO', 'socket closed before connecting to X-Ray daemon'))
            }
            this.socket.once('error', onError)
            this.socket.once('close', onClose)
            this.socket.connect(this.address.port, this.address.host, () => {
                this.socket.off('error', onError)
                this.socket.off('close', onClose)
                resolve()
            })
        })
    }

    /**
     * Creates a client from `AWS_XRAY_DAEMON_ADDRESS`, falling back to
     * {@link Configuration.setDaemonAddress}.
     *
     * @throws {XRayError} `MISSING_ENV_VAR` when no address is available, `BAD_CONFIG` when it cannot be parsed.
     */
    static fromLambdaEnv(config?: Configuration): DaemonClient {
        const impl = config === undefined ? new InternalConfiguration() : toImpl(config)
        const address = impl.getDaemonAddress()
        if (address === undefined) {
            throw XRayError.missingEnvVar(InternalConfiguration.daemonAddressVar)
        }
        return new DaemonClient(parseDaemonAddress(address), impl)
    }

    /**
     * Frames a record: the format preamble, a newline, then the record as JSON.
     *
     * @throws {XRayError} `JSON` when the record cannot be serialized.
     */
    static packet(data: unknown): Buffer {
        let json: string | undefined
        try {
            json = JSON.stringify(data)
        } catch (err) {
            throw new XRayError('JSON', `failed to serialize segment: ${errorMessage(err)}`, err)
        }
        if (json === undefined) {
            throw new XRayError('JSON', 'failed to serialize segment: value has no JSON representation')
        }
        return Buffer.from(`${DaemonClient.HEADER}${DaemonClient.DELIMITER}${json}`, 'utf8')
    }

    async send(data: unknown): Promise<void> {
        const packet = DaemonClient.packet(data)
        await this.connected
        await new Promise<void>((resolve, reject) => {
            const onSent = (err: Error | null) => {
                if (err) {
                    reject(new XRayError('IO', `failed to send segment: ${err.message}`, err))
                } else {
                    resolve()
                }
            }
            try {
                this.socket.send(packet, onSent)
            } catch (err) {
                reject(new XRayError('IO', `failed to send segment: ${errorMessage(err)}`, err))
            }
        })
    }

    close(): void {
        try {
            this.socket.close()
        } catch (err) {
            this.debug(`Socket already closed: ${errorMessage(err)}`)
        }
    }
}

/**
 * A client that cannot fail to exist: either an operational client (`op`) or
 * a no-op client that silently discards every record.
 *
 * @example
 * ```typescript
 * // falls back to no-op outside Lambda
 * const client = InfallibleClient.from(() => DaemonClient.fromLambdaEnv())
 * ```
 */
export class InfallibleClient implements Client {
    private constructor(private readonly client: Client | undefined) {}

    static op(client: Client): InfallibleClient {
        return new InfallibleClient(client)
    }

    static noop(): InfallibleClient {
        return new InfallibleClient(undefined)
    }

    /**
     * Runs a client factory; any error it throws yields a no-op client.
     */
    static from(factory: () => Client): InfallibleClient {
        try {
            return InfallibleClient.op(factory())
        } catch {
            return InfallibleClient.noop()
        }
    }

    get isNoop(): boolean {
        return this.client === undefined
    }

    send(data: unknown): Promise<void> {
        if (this.client === undefined) {
            return Promise.resolve()
        }
        return this.client.send(data)
    }

    close(): void {
        this.client?.close?.()
    }
}
