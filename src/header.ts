// SPDX-FileCopyrightText: 2025 Anaconda, Inc
// SPDX-License-Identifier: Apache-2.0

import { XRayError } from './errors.js'
import { type SegmentId, type TraceId } from './ids.js'

/**
 * Sampling decision carried by the trace header. Values are the wire tokens.
 */
export enum SamplingDecision {
    /** The segment has been sampled and will be sent to the daemon. */
    Sampled = 'Sampled=1',
    /** The segment has not been sampled. */
    NotSampled = 'Sampled=0',
    /** The decision is left to the downstream service. */
    Requested = 'Sampled=?',
    /** No decision present. */
    Unknown = '',
}

export function parseSamplingDecision(fragment: string): SamplingDecision {
    switch (fragment) {
        case SamplingDecision.Sampled:
            return SamplingDecision.Sampled
        case SamplingDecision.NotSampled:
            return SamplingDecision.NotSampled
        case SamplingDecision.Requested:
            return SamplingDecision.Requested
        default:
            return SamplingDecision.Unknown
    }
}

/**
 * Parsed representation of the `X-Amzn-Trace-Id` header.
 *
 * Instances are never mutated; every `with*` method returns a new Header.
 *
 * @example
 * ```typescript
 * const header = Header.parse("Root=1-5759e988-bd862e3fe1be46a994272793;Parent=53995c3f42cd8ad8;Sampled=1")
 * header.withParentId("35b167406b7746cf").toString()
 * // "Root=1-5759e988-bd862e3fe1be46a994272793;Parent=35b167406b7746cf;Sampled=1"
 * ```
 */
export class Header {
    /** HTTP header name associated with X-Ray trace data. */
    static readonly NAME = 'X-Amzn-Trace-Id'

    readonly traceId: TraceId
    readonly parentId: SegmentId | undefined
    readonly samplingDecision: SamplingDecision
    readonly additionalData: ReadonlyMap<string, string>

    constructor(traceId: TraceId,
                parentId?: SegmentId,
                samplingDecision: SamplingDecision = SamplingDecision.Unknown,
                additionalData: ReadonlyMap<string, string> = new Map()) {
        this.traceId = traceId
        this.parentId = parentId
        this.samplingDecision = samplingDecision
        this.additionalData = additionalData
    }

    /**
     * Parses header text. Fragments are separated by `;` and may come in any order.
     * `Self=` fragments are dropped; unknown `key=value` fragments are kept.
     *
     * @throws {XRayError} `BAD_HEADER` when a fragment has no `=` or no `Root=` is present.
     */
    static parse(text: string): Header {
        let traceId: TraceId | undefined = undefined
        let parentId: SegmentId | undefined = undefined
        let sampling = SamplingDecision.Unknown
        const additionalData = new Map<string, string>()
        for (const fragment of text.split(';')) {
            if (fragment === '') {
                continue
            }
            if (fragment.startsWith('Root=')) {
                traceId = fragment.slice('Root='.length)
            } else if (fragment.startsWith('Parent=')) {
                parentId = fragment.slice('Parent='.length)
            } else if (fragment.startsWith('Sampled=')) {
                sampling = parseSamplingDecision(fragment)
            } else if (!fragment.startsWith('Self=')) {
                const eq = fragment.indexOf('=')
                if (eq < 0) {
                    throw new XRayError('BAD_HEADER', `invalid key=value: no \`=\` found in \`${fragment}\``)
                }
                additionalData.set(fragment.slice(0, eq), fragment.slice(eq + 1))
            }
        }
        if (traceId === undefined) {
            throw new XRayError('BAD_HEADER', `no Root= trace id found in \`${text}\``)
        }
        return new Header(traceId, parentId, sampling, additionalData)
    }

    withParentId(parentId: SegmentId): Header {
        return new Header(this.traceId, parentId, this.samplingDecision, this.additionalData)
    }

    withSamplingDecision(decision: SamplingDecision): Header {
        return new Header(this.traceId, this.parentId, decision, this.additionalData)
    }

    /**
     * Returns a new Header with one more (or a replaced) additional `key=value` pair.
     */
    insertData(key: string, value: string): Header {
        const data = new Map(this.additionalData)
        data.set(key, value)
        return new Header(this.traceId, this.parentId, this.samplingDecision, data)
    }

    equals(other: Header): boolean {
        if (this.traceId !== other.traceId ||
            this.parentId !== other.parentId ||
            this.samplingDecision !== other.samplingDecision ||
            this.additionalData.size !== other.additionalData.size) {
            return false
        }
        for (const [key, value] of this.additionalData) {
            if (other.additionalData.get(key) !== value) {
                return false
            }
        }
        return true
    }

    toString(): string {
        return formatHeader(this)
    }
}

/**
 * Renders a Header: `Root=` first, then `Parent=`, the sampling token and the
 * additional pairs in map order.
 */
export function formatHeader(header: Header): string {
    let text = `Root=${header.traceId}`
    if (header.parentId !== undefined) {
        text += `;Parent=${header.parentId}`
    }
    if (header.samplingDecision !== SamplingDecision.Unknown) {
        text += `;${header.samplingDecision}`
    }
    for (const [key, value] of header.additionalData) {
        text += `;${key}=${value}`
    }
    return text
}

export function parseHeader(text: string): Header {
    return Header.parse(text)
}
