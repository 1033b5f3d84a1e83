// SPDX-FileCopyrightText: 2025 Anaconda, Inc
// SPDX-License-Identifier: Apache-2.0

// Types for code readability...

import type { Namespace } from './namespace.js'

/**
 * Represents a map of key-value pairs used for propagating
 * distributed tracing context.
 *
 * Typically used for HTTP headers or other transport mechanisms.
 */
export type CarrierMap = Record<string, string>

/**
 * A strategy that recognizes the remote operation targeted by an outbound
 * request.
 *
 * Classifiers for particular services and SDKs live outside this package; it
 * only consumes them through this interface (see `enterClassified`).
 */
export interface RequestClassifier<TRequest, N extends Namespace = Namespace> {
    /**
     * Returns a namespace for the request, or `undefined` when this strategy does
     * not recognize it.
     */
    classifyRequest(request: TRequest): N | undefined;
}
