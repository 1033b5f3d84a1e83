// SPDX-FileCopyrightText: 2025 Anaconda, Inc
// SPDX-License-Identifier: Apache-2.0

import { jest, expect, describe, test, beforeEach, afterEach } from '@jest/globals';

import { Header } from '../../src/header'
import { AwsNamespace, CustomNamespace, RemoteNamespace } from '../../src/namespace'
import { SubsegmentSession } from '../../src/session'
import { type CarrierMap } from '../../src/types'
import { FailingClient, RecordingClient } from './fakes'

const ROOT = "1-5759e988-bd862e3fe1be46a994272793"
const header = Header.parse(`Root=${ROOT};Parent=53995c3f42cd8ad8;Sampled=1`)

const savedError = console.error
let errorSpy = jest.fn()

beforeEach(() => {
    errorSpy = jest.fn()
    console.error = errorSpy
})

afterEach(() => {
    console.error = savedError
})

describe("entered session", () => {
    test("sends an in-progress record then a complete one", async () => {
        const client = new RecordingClient()
        const session = await SubsegmentSession.enter(client, header, new CustomNamespace("work"))
        expect(session.isEntered).toBe(true)
        expect(client.records.length).toBe(1)
        const [first] = client.records
        expect(first.in_progress).toBe(true)
        expect(first.end_time).toBeUndefined()
        expect(first.name).toBe("work")
        expect(first.trace_id).toBe(ROOT)
        expect(first.parent_id).toBe("53995c3f42cd8ad8")
        expect(first.type).toBe("subsegment")

        await session.end()
        expect(client.records.length).toBe(2)
        const second = client.records[1]
        expect(second.in_progress).toBe(false)
        expect(second.end_time).toBeDefined()
        expect(second.end_time ?? 0).toBeGreaterThanOrEqual(second.start_time)
        expect(second.id).toBe(first.id)
        expect(second.trace_id).toBe(first.trace_id)
        expect(second.start_time).toBe(first.start_time)
    })

    test("propagates a header whose parent is the new subsegment", async () => {
        const client = new RecordingClient()
        const session = await SubsegmentSession.enter(client, header, new CustomNamespace("work"))
        const id = client.records[0].id
        expect(session.xAmznTraceId()).toBe(`Root=${ROOT};Parent=${id};Sampled=1`)

        const carrier: CarrierMap = {}
        session.inject(carrier)
        expect(carrier).toEqual({ "X-Amzn-Trace-Id": `Root=${ROOT};Parent=${id};Sampled=1` })
        await session.end()
    })

    test("keeps additional header data in the propagated header", async () => {
        const client = new RecordingClient()
        const withLineage = header.insertData("Lineage", "01234567:0")
        const session = await SubsegmentSession.enter(client, withLineage, new CustomNamespace("work"))
        const id = client.records[0].id
        expect(session.xAmznTraceId()).toBe(`Root=${ROOT};Parent=${id};Sampled=1;Lineage=01234567:0`)
        await session.end()
    })

    test("applies the name prefix", async () => {
        const client = new RecordingClient()
        const session = await SubsegmentSession.enter(client, header, new CustomNamespace("work"), "fn.")
        await session.end()
        expect(client.records.map((r) => r.name)).toEqual(["fn.work", "fn.work"])
    })

    test("ends only once", async () => {
        const client = new RecordingClient()
        const session = await SubsegmentSession.enter(client, header, new CustomNamespace("work"))
        await Promise.all([session.end(), session.end()])
        await session.end()
        expect(client.records.length).toBe(2)
    })

    test("records fields set on the namespace before the end", async () => {
        const client = new RecordingClient()
        const session = await SubsegmentSession.enter(client, header, new AwsNamespace("S3", "GetObject"))
        expect(client.records[0].aws).toEqual({ operation: "GetObject" })
        expect(client.records[0].namespace).toBe("aws")

        session.namespaceMut()?.requestId("abc")
        await session.end()
        const last = client.records[1]
        expect(last.namespace).toBe("aws")
        expect(last.aws).toEqual({ operation: "GetObject", request_id: "abc" })
    })

    test("records the response of a remote call", async () => {
        const client = new RecordingClient()
        const session = await SubsegmentSession.enter(client, header,
            new RemoteNamespace("example", "GET", "https://example.com/"))
        expect(client.records[0].http).toEqual({ request: { method: "GET", url: "https://example.com/" } })

        session.namespaceMut()?.responseStatus(200)
        await session.end()
        expect(client.records[1].namespace).toBe("remote")
        expect(client.records[1].http).toEqual({
            request: { method: "GET", url: "https://example.com/" },
            response: { status: 200 },
        })
    })

    test("swallows and logs a failed final send", async () => {
        const client = new FailingClient(1)
        const session = await SubsegmentSession.enter(client, header, new CustomNamespace("work"))
        expect(session.isEntered).toBe(true)
        await expect(session.end()).resolves.toBeUndefined()
        expect(client.attempts).toBe(2)
        expect(errorSpy).toHaveBeenCalledTimes(1)
    })
})

describe("failed session", () => {
    test("results from a failed initial send", async () => {
        const client = new FailingClient()
        const session = await SubsegmentSession.enter(client, header, new AwsNamespace("S3", "GetObject"))
        expect(session.isEntered).toBe(false)
        expect(session.xAmznTraceId()).toBeUndefined()
        expect(session.namespaceMut()).toBeUndefined()

        const carrier: CarrierMap = {}
        session.inject(carrier)
        expect(carrier).toEqual({})

        await session.end()
        expect(client.attempts).toBe(1)
        expect(errorSpy).not.toHaveBeenCalled()
    })

    test("results from a namespace that throws", async () => {
        const client = new RecordingClient()
        const namespace = new CustomNamespace("work")
        namespace.updateSubsegment = () => { throw new Error("broken decorator") }
        const session = await SubsegmentSession.enter(client, header, namespace)
        expect(session.isEntered).toBe(false)
        expect(client.records.length).toBe(0)
    })

    test("can be created directly", async () => {
        const session = SubsegmentSession.failed<AwsNamespace>()
        expect(session.isEntered).toBe(false)
        expect(session.namespaceMut()?.requestId("abc")).toBeUndefined()
        await expect(session.end()).resolves.toBeUndefined()
    })
})
