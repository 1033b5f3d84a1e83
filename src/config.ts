// SPDX-FileCopyrightText: 2025 Anaconda, Inc
// SPDX-License-Identifier: Apache-2.0

import { XRayError } from './errors.js'

/**
 * Represents the configuration for the X-Ray daemon client and subsegment context.
 *
 * Allows setting the daemon address, the inbound trace header, the prefix of
 * custom subsegment names and the debug state. Inside a Lambda function none of
 * these need to be set: the runtime provides the daemon address and the trace
 * header through the environment.
 *
 * @remarks
 * Environment variables override values set on this object:
 * - `AWS_XRAY_DAEMON_ADDRESS` (the daemon address, `ip:port` or `[ipv6]:port`)
 * - `_X_AMZN_TRACE_ID` (the trace header of the current invocation)
 * - `XRAY_LITE_NAME_PREFIX` (prefix prepended to custom subsegment names)
 * - `XRAY_LITE_USE_DEBUG` (use "true" or "yes" or "1" to print debug diagnostics)
 *
 * @example
 * ```typescript
 * const config = new Configuration()
 *     .setDaemonAddress("127.0.0.1:2000")
 *     .setNamePrefix("my_function.")
 * ```
 */
export class Configuration {
    private _impl: InternalConfiguration
    private readonly _id: string

    public constructor() {
        this._impl = new InternalConfiguration()
        this._id = String(InternalConfiguration.__nextId++)
        InternalConfiguration.__lookupImpl[this._id] = this._impl
    }

    /**
     * Sets the address of the X-Ray daemon, used when `AWS_XRAY_DAEMON_ADDRESS` is not set.
     *
     * @param address - `ip:port` or `[ipv6]:port`. Validated when a client is built.
     * @returns The current instance for method chaining.
     */
    public setDaemonAddress(address: string): this {
        this._impl.daemonAddress = address
        return this
    }

    /**
     * Sets the trace header text, used when `_X_AMZN_TRACE_ID` is not set.
     *
     * @param header - Header text such as `Root=1-5759e988-bd862e3fe1be46a994272793;Sampled=1`.
     * @returns The current instance for method chaining.
     */
    public setTraceHeader(header: string): this {
        this._impl.traceHeader = header
        return this
    }

    /**
     * Sets the prefix prepended to the names of custom subsegments.
     *
     * @returns The current instance for method chaining.
     */
    public setNamePrefix(prefix: string): this {
        this._impl.namePrefix = prefix
        return this
    }

    /**
     * Enables or disables debug diagnostics.
     *
     * @param newState - Whether to enable debug mode (default: `false`).
     * @returns The current instance for method chaining.
     */
    public setDebugState(newState: boolean): this {
        this._impl.useDebug = newState
        return this
    }

    // This returns the unique identifier for this configuration instance. This is not intended for public use.
    /**
     * @hidden
     */
    public get __id(): string {
        return this._id
    }
}

// Internal configuration storage and retrieval
export class InternalConfiguration {
    public static __nextId: number = 0
    public static __lookupImpl: { [key: string]: InternalConfiguration } = {}

    public static checkIfEnvUndefined(value: string | undefined): boolean {
        return value === undefined || value === '' || value === 'undefined' || value === 'null'
    }

    // Assigning `undefined` to a process.env key stores the string "undefined".
    public static readEnv(name: string): string | undefined {
        const value = process.env[name]
        return InternalConfiguration.checkIfEnvUndefined(value) ? undefined : value
    }

    public static readonly daemonAddressVar = 'AWS_XRAY_DAEMON_ADDRESS'
    public static readonly traceHeaderVar = '_X_AMZN_TRACE_ID'

    public daemonAddress: string | undefined = undefined
    public traceHeader: string | undefined = undefined
    public namePrefix: string = ""
    public useDebug: boolean = false

    public constructor() {}

    public getDaemonAddress(): string | undefined {
        return InternalConfiguration.readEnv(InternalConfiguration.daemonAddressVar) ?? this.daemonAddress
    }

    public getTraceHeader(): string | undefined {
        return InternalConfiguration.readEnv(InternalConfiguration.traceHeaderVar) ?? this.traceHeader
    }

    public getNamePrefix(): string {
        return InternalConfiguration.readEnv('XRAY_LITE_NAME_PREFIX') ?? this.namePrefix
    }

    public getUseDebug(): boolean {
        const env = InternalConfiguration.readEnv('XRAY_LITE_USE_DEBUG')
        if (env !== undefined) {
            const str = env.toLowerCase()
            return str === "true" || str === "yes" || str === "1"
        }
        return this.useDebug
    }
}

// Used inside the package to get the private impl from the public class.
export function toImpl(configuration: Configuration): InternalConfiguration {
    const impl = InternalConfiguration.__lookupImpl[configuration.__id]
    if (impl === undefined) {
        throw XRayError.badConfig(`unknown configuration instance ${configuration.__id}`)
    }
    return impl
}
