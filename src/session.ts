// SPDX-FileCopyrightText: 2025 Anaconda, Inc
// SPDX-License-Identifier: Apache-2.0

import { type Client } from './client.js'
import { localTimeString as lts } from './common.js'
import { errorMessage } from './errors.js'
import { Header } from './header.js'
import { type Namespace } from './namespace.js'
import { Subsegment } from './segment.js'
import { type CarrierMap } from './types.js'

type SessionState<N extends Namespace> =
    | { readonly kind: 'entered', client: Client, header: Header, subsegment: Subsegment, namespace: N }
    | { readonly kind: 'failed' }

/**
 * A subsegment in flight. Owned by the code doing the traced work and never
 * shared.
 *
 * A session is `entered` when the in-progress record reached the daemon client,
 * `failed` otherwise; that is decided once, when it is created. An entered
 * session reports the completed subsegment when {@link end} is called. A failed
 * session does nothing at all.
 *
 * @example
 * ```typescript
 * const session = await context.enterSubsegment(new AwsNamespace("S3", "GetObject"))
 * try {
 *     const out = await s3.send(command, { headers: { "X-Amzn-Trace-Id": session.xAmznTraceId() } })
 *     session.namespaceMut()?.requestId(out.$metadata.requestId ?? "")
 * } finally {
 *     await session.end()
 * }
 * ```
 */
export class SubsegmentSession<N extends Namespace = Namespace> {
    private readonly state: SessionState<N>
    private ended = false

    private constructor(state: SessionState<N>) {
        this.state = state
    }

    /**
     * Begins a subsegment under `header`, decorates it with `namespace` and sends
     * it as in progress. Never rejects.
     */
    static async enter<N extends Namespace>(client: Client, header: Header, namespace: N,
                                            namePrefix: string = ""): Promise<SubsegmentSession<N>> {
        try {
            const subsegment = Subsegment.begin(header.traceId, header.parentId, namespace.name(namePrefix))
            namespace.updateSubsegment(subsegment)
            await client.send(subsegment)
            return new SubsegmentSession<N>({
                kind: 'entered',
                client,
                header: header.withParentId(subsegment.id),
                subsegment,
                namespace,
            })
        } catch {
            return SubsegmentSession.failed<N>()
        }
    }

    static failed<N extends Namespace = Namespace>(): SubsegmentSession<N> {
        return new SubsegmentSession<N>({ kind: 'failed' })
    }

    get isEntered(): boolean {
        return this.state.kind === 'entered'
    }

    /**
     * The `X-Amzn-Trace-Id` value to send downstream: this subsegment becomes the
     * parent. `undefined` for a failed session, in which case no header should be sent.
     */
    xAmznTraceId(): string | undefined {
        switch (this.state.kind) {
            case 'entered':
                return this.state.header.toString()
            case 'failed':
                return undefined
        }
    }

    /**
     * The live namespace, for attaching response details before the session ends.
     */
    namespaceMut(): N | undefined {
        switch (this.state.kind) {
            case 'entered':
                return this.state.namespace
            case 'failed':
                return undefined
        }
    }

    /**
     * Writes the trace header into `carrier` when the session is entered.
     */
    inject(carrier: CarrierMap): void {
        const value = this.xAmznTraceId()
        if (value !== undefined) {
            carrier[Header.NAME] = value
        }
    }

    /**
     * Ends the subsegment and reports it. Only the first call has any effect and
     * the returned promise never rejects.
     */
    async end(): Promise<void> {
        if (this.ended) {
            return
        }
        this.ended = true
        switch (this.state.kind) {
            case 'entered': {
                const { client, subsegment, namespace } = this.state
                try {
                    subsegment.end()
                    namespace.updateSubsegment(subsegment)
                    await client.send(subsegment)
                } catch (err) {
                    console.error(`${lts()} > *** XRAY ERROR: failed to end subsegment: ${errorMessage(err)}`)
                }
                break
            }
            case 'failed':
                break
        }
    }
}
