// SPDX-FileCopyrightText: 2025 Anaconda, Inc
// SPDX-License-Identifier: Apache-2.0

import { RandomIdGenerator } from '@opentelemetry/sdk-trace-base';

/** Trace id as rendered on the wire, e.g. `1-5759e988-bd862e3fe1be46a994272793`. */
export type TraceId = string

/** Segment id as rendered on the wire: 16 lower-case hex digits. */
export type SegmentId = string

/** Floating point seconds since the Unix epoch. */
export type Seconds = number

const idGenerator = new RandomIdGenerator()

/**
 * Generates a fresh trace id: version `1`, the current epoch seconds as 8 hex
 * digits, then 96 random bits as 24 hex digits.
 */
export function newTraceId(): TraceId {
    const epoch = Math.floor(Date.now() / 1000).toString(16).padStart(8, '0')
    return `1-${epoch}-${idGenerator.generateTraceId().slice(8)}`
}

export function newSegmentId(): SegmentId {
    return idGenerator.generateSpanId()
}

export function nowSeconds(): Seconds {
    return (performance.timeOrigin + performance.now()) / 1000
}
