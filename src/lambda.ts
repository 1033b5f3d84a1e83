// SPDX-FileCopyrightText: 2025 Anaconda, Inc
// SPDX-License-Identifier: Apache-2.0

import { Configuration, InternalConfiguration, toImpl } from './config.js'
import { XRayError, errorMessage } from './errors.js'
import { Header } from './header.js'

/**
 * Reads the trace header of the currently executing Lambda invocation from
 * `_X_AMZN_TRACE_ID`, falling back to {@link Configuration.setTraceHeader}.
 *
 * @throws {XRayError} `MISSING_ENV_VAR` when no header is available, `BAD_CONFIG`
 *         when the header text cannot be parsed.
 */
export function header(config: Configuration | InternalConfiguration = new InternalConfiguration()): Header {
    const impl = config instanceof InternalConfiguration ? config : toImpl(config)
    const text = impl.getTraceHeader()
    if (text === undefined) {
        throw XRayError.missingEnvVar(InternalConfiguration.traceHeaderVar)
    }
    try {
        return Header.parse(text)
    } catch (err) {
        throw XRayError.badConfig(`invalid X-Ray trace ID header value: ${errorMessage(err)}`, err)
    }
}
