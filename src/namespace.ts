// SPDX-FileCopyrightText: 2025 Anaconda, Inc
// SPDX-License-Identifier: Apache-2.0

import { type Subsegment } from './segment.js'

/**
 * Decoration strategy of a subsegment: gives it a display name and fills in
 * domain specific fields.
 *
 * Implement this interface to add namespaces of your own; a session needs
 * nothing else from it.
 */
export interface Namespace {
    /**
     * Display name of the subsegment. Implementations may ignore `prefix`.
     */
    name(prefix: string): string;

    /**
     * Merges this namespace's fields into the subsegment. Called once when the
     * subsegment is entered and once more when it ends; must only fill fields
     * that are still absent.
     */
    updateSubsegment(subsegment: Subsegment): void;
}

/**
 * Namespace for an AWS service operation, e.g. `new AwsNamespace("S3", "GetObject")`.
 */
export class AwsNamespace implements Namespace {
    readonly service: string
    readonly operation: string
    private _requestId: string | undefined = undefined
    private _responseStatus: number | undefined = undefined

    constructor(service: string, operation: string) {
        this.service = service
        this.operation = operation
    }

    requestId(requestId: string): this {
        this._requestId = requestId
        return this
    }

    responseStatus(status: number): this {
        this._responseStatus = status
        return this
    }

    name(_prefix: string): string {
        return this.service
    }

    updateSubsegment(subsegment: Subsegment): void {
        subsegment.setNamespace('aws')
        subsegment.setAwsOperation({ operation: this.operation, requestId: this._requestId })
        if (this._responseStatus !== undefined) {
            subsegment.setHttpResponse({ status: this._responseStatus })
        }
    }
}

/**
 * Namespace for a call to an arbitrary remote HTTP service.
 */
export class RemoteNamespace implements Namespace {
    readonly remoteName: string
    readonly method: string
    readonly url: string
    private _responseStatus: number | undefined = undefined

    constructor(name: string, method: string, url: string) {
        this.remoteName = name
        this.method = method
        this.url = url
    }

    responseStatus(status: number): this {
        this._responseStatus = status
        return this
    }

    name(_prefix: string): string {
        return this.remoteName
    }

    updateSubsegment(subsegment: Subsegment): void {
        subsegment.setNamespace('remote')
        subsegment.setHttpRequest({ method: this.method, url: this.url })
        if (this._responseStatus !== undefined) {
            subsegment.setHttpResponse({ status: this._responseStatus })
        }
    }
}

/**
 * Namespace of a custom subsegment. The only namespace honoring the name prefix.
 */
export class CustomNamespace implements Namespace {
    readonly customName: string

    constructor(name: string) {
        this.customName = name
    }

    name(prefix: string): string {
        return `${prefix}${this.customName}`
    }

    // does nothing
    updateSubsegment(_subsegment: Subsegment): void {}
}
