// SPDX-FileCopyrightText: 2025 Anaconda, Inc
// SPDX-License-Identifier: Apache-2.0

import {
    type Context,
    type TextMapGetter,
    type TextMapPropagator,
    type TextMapSetter,
    TraceFlags,
    isSpanContextValid,
    trace,
} from '@opentelemetry/api';

import { Header, SamplingDecision } from './header.js'

const XRAY_TRACE_ID = /^1-([0-9a-f]{8})-([0-9a-f]{24})$/
const OTEL_TRACE_ID = /^[0-9a-f]{32}$/

/**
 * Converts an X-Ray trace id (`1-5759e988-bd862e3fe1be46a994272793`) to the
 * 32 hex digit form used by OpenTelemetry, or `undefined` if it is not one.
 */
export function toOtelTraceId(traceId: string): string | undefined {
    const match = XRAY_TRACE_ID.exec(traceId)
    if (match === null) {
        return undefined
    }
    return `${match[1]}${match[2]}`
}

export function toXRayTraceId(traceId: string): string | undefined {
    if (!OTEL_TRACE_ID.test(traceId)) {
        return undefined
    }
    return `1-${traceId.slice(0, 8)}-${traceId.slice(8)}`
}

/**
 * Propagates the active OpenTelemetry span context through the `X-Amzn-Trace-Id`
 * header, so that spans of an OpenTelemetry instrumented process and X-Ray
 * subsegments join the same trace.
 *
 * @example
 * ```typescript
 * import { propagation } from '@opentelemetry/api'
 * propagation.setGlobalPropagator(new XRayPropagator())
 * ```
 */
export class XRayPropagator implements TextMapPropagator {
    inject(context: Context, carrier: unknown, setter: TextMapSetter): void {
        const spanContext = trace.getSpanContext(context)
        if (spanContext === undefined || !isSpanContextValid(spanContext)) {
            return
        }
        const traceId = toXRayTraceId(spanContext.traceId)
        if (traceId === undefined) {
            return
        }
        const sampled = (spanContext.traceFlags & TraceFlags.SAMPLED) === TraceFlags.SAMPLED
        const header = new Header(traceId, spanContext.spanId,
                                  sampled ? SamplingDecision.Sampled : SamplingDecision.NotSampled)
        setter.set(carrier, Header.NAME, header.toString())
    }

    extract(context: Context, carrier: unknown, getter: TextMapGetter): Context {
        const text = this.readHeader(carrier, getter)
        if (text === undefined) {
            return context
        }
        let header: Header
        try {
            header = Header.parse(text)
        } catch {
            return context
        }
        const traceId = toOtelTraceId(header.traceId)
        if (traceId === undefined || header.parentId === undefined) {
            return context
        }
        const spanContext = {
            traceId,
            spanId: header.parentId,
            traceFlags: header.samplingDecision === SamplingDecision.Sampled ? TraceFlags.SAMPLED : TraceFlags.NONE,
            isRemote: true,
        }
        if (!isSpanContextValid(spanContext)) {
            return context
        }
        return trace.setSpanContext(context, spanContext)
    }

    fields(): string[] {
        return [Header.NAME]
    }

    // Carriers such as Node's IncomingHttpHeaders use lower-case keys.
    private readHeader(carrier: unknown, getter: TextMapGetter): string | undefined {
        const wanted = Header.NAME.toLowerCase()
        const key = getter.keys(carrier).find((k) => k.toLowerCase() === wanted)
        if (key === undefined) {
            return undefined
        }
        const value = getter.get(carrier, key)
        return Array.isArray(value) ? value[0] : value
    }
}
