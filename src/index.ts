// SPDX-FileCopyrightText: 2025 Anaconda, Inc
// SPDX-License-Identifier: Apache-2.0

// Expose public API here...
export * from './types.js';
export { Configuration } from './config.js';
export { XRayError, type XRayErrorCode } from './errors.js';
export { newTraceId, newSegmentId, type TraceId, type SegmentId, type Seconds } from './ids.js';
export { Header, SamplingDecision, formatHeader, parseHeader } from './header.js';
export { header } from './lambda.js';
export {
    Subsegment,
    type SubsegmentRecord,
    type AwsOperation,
    type Http,
    type HttpRequest,
    type HttpResponse
} from './segment.js';
export {
    DaemonClient,
    InfallibleClient,
    parseDaemonAddress,
    type Client,
    type DaemonAddress
} from './client.js';
export { AwsNamespace, RemoteNamespace, CustomNamespace, type Namespace } from './namespace.js';
export { SubsegmentSession } from './session.js';
export {
    SubsegmentContext,
    InfallibleContext,
    withSubsegment,
    enterClassified,
    type Context
} from './context.js';
export { XRayPropagator, toOtelTraceId, toXRayTraceId } from './propagator.js';
