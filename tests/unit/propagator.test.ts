// SPDX-FileCopyrightText: 2025 Anaconda, Inc
// SPDX-License-Identifier: Apache-2.0

import { expect, describe, test } from '@jest/globals';
import {
    ROOT_CONTEXT,
    TraceFlags,
    defaultTextMapGetter,
    defaultTextMapSetter,
    trace,
} from '@opentelemetry/api'

import { XRayPropagator, toOtelTraceId, toXRayTraceId } from '../../src/propagator'
import { type CarrierMap } from '../../src/types'

const propagator = new XRayPropagator()

describe("trace id conversion", () => {
    test("X-Ray to OpenTelemetry", () => {
        expect(toOtelTraceId("1-5759e988-bd862e3fe1be46a994272793")).toBe("5759e988bd862e3fe1be46a994272793")
        expect(toOtelTraceId("2-5759e988-bd862e3fe1be46a994272793")).toBeUndefined()
        expect(toOtelTraceId("not-a-trace-id")).toBeUndefined()
    })

    test("OpenTelemetry to X-Ray", () => {
        expect(toXRayTraceId("5759e988bd862e3fe1be46a994272793")).toBe("1-5759e988-bd862e3fe1be46a994272793")
        expect(toXRayTraceId("5759e988")).toBeUndefined()
    })
})

describe("XRayPropagator.extract", () => {
    test("sets a remote span context", () => {
        const carrier: CarrierMap = {
            "x-amzn-trace-id": "Root=1-5759e988-bd862e3fe1be46a994272793;Parent=53995c3f42cd8ad8;Sampled=1",
        }
        const context = propagator.extract(ROOT_CONTEXT, carrier, defaultTextMapGetter)
        expect(trace.getSpanContext(context)).toEqual({
            traceId: "5759e988bd862e3fe1be46a994272793",
            spanId: "53995c3f42cd8ad8",
            traceFlags: TraceFlags.SAMPLED,
            isRemote: true,
        })
    })

    test("marks non-sampled traces", () => {
        const carrier: CarrierMap = {
            "X-Amzn-Trace-Id": "Root=1-5759e988-bd862e3fe1be46a994272793;Parent=53995c3f42cd8ad8;Sampled=0",
        }
        const context = propagator.extract(ROOT_CONTEXT, carrier, defaultTextMapGetter)
        expect(trace.getSpanContext(context)?.traceFlags).toBe(TraceFlags.NONE)
    })

    test.each([
        ["no header", {}],
        ["no parent", { "x-amzn-trace-id": "Root=1-5759e988-bd862e3fe1be46a994272793;Sampled=1" }],
        ["malformed header", { "x-amzn-trace-id": "Root=1-5759e988-bd862e3fe1be46a994272793;oops" }],
        ["foreign trace id", { "x-amzn-trace-id": "Root=abc;Parent=53995c3f42cd8ad8" }],
        ["bad parent", { "x-amzn-trace-id": "Root=1-5759e988-bd862e3fe1be46a994272793;Parent=xyz" }],
    ])("leaves the context unchanged on %s", (_label, carrier) => {
        expect(propagator.extract(ROOT_CONTEXT, carrier, defaultTextMapGetter)).toBe(ROOT_CONTEXT)
    })
})

describe("XRayPropagator.inject", () => {
    test("renders the active span context", () => {
        const context = trace.setSpanContext(ROOT_CONTEXT, {
            traceId: "5759e988bd862e3fe1be46a994272793",
            spanId: "53995c3f42cd8ad8",
            traceFlags: TraceFlags.SAMPLED,
        })
        const carrier: CarrierMap = {}
        propagator.inject(context, carrier, defaultTextMapSetter)
        expect(carrier).toEqual({
            "X-Amzn-Trace-Id": "Root=1-5759e988-bd862e3fe1be46a994272793;Parent=53995c3f42cd8ad8;Sampled=1",
        })
    })

    test("writes nothing without a valid span context", () => {
        const carrier: CarrierMap = {}
        propagator.inject(ROOT_CONTEXT, carrier, defaultTextMapSetter)
        expect(carrier).toEqual({})
    })

    test("extract then inject round-trips the header", () => {
        const text = "Root=1-65dfb5a1-0123456789abcdef01234567;Parent=0123456789abcdef;Sampled=0"
        const context = propagator.extract(ROOT_CONTEXT, { "X-Amzn-Trace-Id": text }, defaultTextMapGetter)
        const carrier: CarrierMap = {}
        propagator.inject(context, carrier, defaultTextMapSetter)
        expect(carrier["X-Amzn-Trace-Id"]).toBe(text)
    })

    test("declares its header field", () => {
        expect(propagator.fields()).toEqual(["X-Amzn-Trace-Id"])
    })
})
