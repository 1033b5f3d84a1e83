// SPDX-FileCopyrightText: 2025 Anaconda, Inc
// SPDX-License-Identifier: Apache-2.0

/**
 * Error codes raised by this package.
 *
 * - `MISSING_ENV_VAR`: a required environment variable is not set.
 * - `BAD_CONFIG`: a configuration value could not be parsed.
 * - `BAD_HEADER`: trace header text does not follow the header grammar.
 * - `IO`: the datagram socket failed to send.
 * - `JSON`: a segment record could not be serialized.
 */
export type XRayErrorCode =
    | 'MISSING_ENV_VAR'
    | 'BAD_CONFIG'
    | 'BAD_HEADER'
    | 'IO'
    | 'JSON'

/**
 * The single error type thrown (construction time) or logged (run time) by
 * this package.
 *
 * @example
 * ```typescript
 * try {
 *     const client = DaemonClient.fromLambdaEnv()
 * } catch (err) {
 *     if (err instanceof XRayError && err.code === 'MISSING_ENV_VAR') {
 *         // not running inside Lambda, trace nothing
 *     }
 * }
 * ```
 */
export class XRayError extends Error {
    override readonly name = 'XRayError'

    constructor(
        public readonly code: XRayErrorCode,
        message: string,
        public readonly cause?: unknown
    ) {
        super(message)
        Object.setPrototypeOf(this, XRayError.prototype)
    }

    static missingEnvVar(variable: string): XRayError {
        return new XRayError('MISSING_ENV_VAR', `missing environment variable: ${variable}`)
    }

    static badConfig(detail: string, cause?: unknown): XRayError {
        return new XRayError('BAD_CONFIG', `bad configuration: ${detail}`, cause)
    }
}

/**
 * Renders any thrown value as a one-line message.
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message
    }
    return String(error)
}
