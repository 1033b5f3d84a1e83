// SPDX-FileCopyrightText: 2025 Anaconda, Inc
// SPDX-License-Identifier: Apache-2.0

import { newSegmentId, nowSeconds, type SegmentId, type Seconds, type TraceId } from './ids.js'

/** `aws` block of a subsegment record. */
export interface AwsOperation {
    operation?: string
    request_id?: string
}

export interface HttpRequest {
    method?: string
    url?: string
}

export interface HttpResponse {
    status?: number
}

/** `http` block of a subsegment record. */
export interface Http {
    request?: HttpRequest
    response?: HttpResponse
}

/**
 * JSON record of a subsegment as the daemon receives it.
 */
export interface SubsegmentRecord {
    id: SegmentId
    name: string
    start_time: Seconds
    end_time?: Seconds
    in_progress: boolean
    trace_id: TraceId
    parent_id?: SegmentId
    type: 'subsegment'
    namespace?: string
    aws?: AwsOperation
    http?: Http
}

/**
 * A subsegment: a unit of work reported independently of its parent segment.
 *
 * Every setter only fills fields that are still absent, so the decoration made
 * when a subsegment is entered and the one made when it ends never clobber each
 * other.
 */
export class Subsegment {
    readonly id: SegmentId
    readonly name: string
    readonly startTime: Seconds
    readonly traceId: TraceId
    readonly parentId: SegmentId | undefined
    endTime: Seconds | undefined = undefined
    inProgress: boolean = true
    namespace: string | undefined = undefined
    aws: AwsOperation | undefined = undefined
    http: Http | undefined = undefined

    constructor(traceId: TraceId, parentId: SegmentId | undefined, name: string,
                id: SegmentId = newSegmentId(), startTime: Seconds = nowSeconds()) {
        this.id = id
        this.name = name
        this.startTime = startTime
        this.traceId = traceId
        this.parentId = parentId
    }

    /**
     * Starts an in-progress subsegment with a fresh id.
     */
    static begin(traceId: TraceId, parentId: SegmentId | undefined, name: string): Subsegment {
        return new Subsegment(traceId, parentId, name)
    }

    /**
     * Records the end time. Calling it more than once is not supported; the
     * session owning the subsegment calls it exactly once.
     */
    end(): void {
        this.endTime = nowSeconds()
        this.inProgress = false
    }

    get isComplete(): boolean {
        return this.endTime !== undefined && !this.inProgress
    }

    setNamespace(namespace: string): this {
        this.namespace ??= namespace
        return this
    }

    setAwsOperation(fields: { operation?: string, requestId?: string }): this {
        const aws = this.aws ??= {}
        if (aws.operation === undefined && fields.operation !== undefined) {
            aws.operation = fields.operation
        }
        if (aws.request_id === undefined && fields.requestId !== undefined) {
            aws.request_id = fields.requestId
        }
        return this
    }

    setHttpRequest(fields: HttpRequest): this {
        const http = this.http ??= {}
        const request = http.request ??= {}
        if (request.method === undefined && fields.method !== undefined) {
            request.method = fields.method
        }
        if (request.url === undefined && fields.url !== undefined) {
            request.url = fields.url
        }
        return this
    }

    // Allocates the http block when needed; a request block is not required.
    setHttpResponse(fields: HttpResponse): this {
        const http = this.http ??= {}
        const response = http.response ??= {}
        if (response.status === undefined && fields.status !== undefined) {
            response.status = fields.status
        }
        return this
    }

    toJSON(): SubsegmentRecord {
        const record: SubsegmentRecord = {
            id: this.id,
            name: this.name,
            start_time: this.startTime,
            in_progress: this.inProgress,
            trace_id: this.traceId,
            type: 'subsegment',
        }
        if (this.endTime !== undefined) {
            record.end_time = this.endTime
        }
        if (this.parentId !== undefined) {
            record.parent_id = this.parentId
        }
        if (this.namespace !== undefined) {
            record.namespace = this.namespace
        }
        if (this.aws !== undefined) {
            record.aws = this.aws
        }
        if (this.http !== undefined) {
            record.http = this.http
        }
        return record
    }
}
