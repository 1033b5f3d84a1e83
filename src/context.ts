// SPDX-FileCopyrightText: 2025 Anaconda, Inc
// SPDX-License-Identifier: Apache-2.0

import { type Client } from './client.js'
import { XRayCommon } from './common.js'
import { Configuration, InternalConfiguration, toImpl } from './config.js'
import { Header } from './header.js'
import { header as lambdaHeader } from './lambda.js'
import { type Namespace } from './namespace.js'
import { SubsegmentSession } from './session.js'
import { type RequestClassifier } from './types.js'

/**
 * Where subsegments are entered from.
 */
export interface Context {
    /**
     * Enters a new subsegment. The returned session records the end of the
     * subsegment when its `end()` is called.
     */
    enterSubsegment<N extends Namespace>(namespace: N): Promise<SubsegmentSession<N>>;
}

/**
 * Context as a subsegment of an existing segment, typically the segment the
 * Lambda runtime opened for the current invocation.
 *
 * @example
 * ```typescript
 * const client = DaemonClient.fromLambdaEnv()
 * const context = SubsegmentContext.fromLambdaEnv(client).withNamePrefix("my_function.")
 * // subsegment named "my_function.do_something"
 * await withSubsegment(context, new CustomNamespace("do_something"), async () => { ... })
 * ```
 */
export class SubsegmentContext extends XRayCommon implements Context {
    readonly client: Client
    readonly header: Header
    private readonly _namePrefix: string | undefined

    constructor(client: Client, header: Header,
                config: Configuration | InternalConfiguration = new InternalConfiguration(),
                namePrefix?: string) {
        super(config)
        this.client = client
        this.header = header
        this._namePrefix = namePrefix
    }

    /**
     * Creates a context from `_X_AMZN_TRACE_ID`, falling back to
     * {@link Configuration.setTraceHeader}.
     *
     * @throws {XRayError} `MISSING_ENV_VAR` or `BAD_CONFIG`.
     */
    static fromLambdaEnv(client: Client, config?: Configuration): SubsegmentContext {
        const impl = config === undefined ? new InternalConfiguration() : toImpl(config)
        return new SubsegmentContext(client, lambdaHeader(impl), impl)
    }

    /**
     * Returns a copy of this context whose custom subsegment names start with
     * `prefix`. Only {@link CustomNamespace} honors the prefix.
     */
    withNamePrefix(prefix: string): SubsegmentContext {
        return new SubsegmentContext(this.client, this.header, this.config, prefix)
    }

    protected override get namePrefix(): string {
        return this._namePrefix ?? super.namePrefix
    }

    async enterSubsegment<N extends Namespace>(namespace: N): Promise<SubsegmentSession<N>> {
        const session = await SubsegmentSession.enter(this.client, this.header, namespace, this.namePrefix)
        if (!session.isEntered) {
            // namespace.name() may throw; not called again here
            this.debug('Failed to enter subsegment; tracing is disabled for it.')
        }
        return session
    }
}

/**
 * A context that cannot fail to exist: either operational (`op`) or a no-op
 * context whose sessions are all failed.
 *
 * @example
 * ```typescript
 * const context = InfallibleContext.from(() =>
 *     SubsegmentContext.fromLambdaEnv(DaemonClient.fromLambdaEnv()))
 * ```
 */
export class InfallibleContext implements Context {
    private constructor(private readonly context: Context | undefined) {}

    static op(context: Context): InfallibleContext {
        return new InfallibleContext(context)
    }

    static noop(): InfallibleContext {
        return new InfallibleContext(undefined)
    }

    /**
     * Runs a context factory; any error it throws yields a no-op context.
     */
    static from(factory: () => Context): InfallibleContext {
        try {
            return InfallibleContext.op(factory())
        } catch {
            return InfallibleContext.noop()
        }
    }

    get isNoop(): boolean {
        return this.context === undefined
    }

    enterSubsegment<N extends Namespace>(namespace: N): Promise<SubsegmentSession<N>> {
        if (this.context === undefined) {
            return Promise.resolve(SubsegmentSession.failed<N>())
        }
        return this.context.enterSubsegment(namespace)
    }
}

/**
 * Runs `work` inside a subsegment and ends the subsegment exactly once,
 * whether `work` returns or throws. The outcome of `work` is passed through
 * untouched.
 */
export async function withSubsegment<N extends Namespace, T>(
    context: Context,
    namespace: N,
    work: (session: SubsegmentSession<N>) => Promise<T> | T
): Promise<T> {
    const session = await context.enterSubsegment(namespace)
    try {
        return await work(session)
    } finally {
        await session.end()
    }
}

/**
 * Classifies `request` and enters a subsegment for it. Resolves to `undefined`
 * when the classifier does not recognize the request.
 */
export async function enterClassified<TRequest, N extends Namespace>(
    context: Context,
    classifier: RequestClassifier<TRequest, N>,
    request: TRequest
): Promise<SubsegmentSession<N> | undefined> {
    const namespace = classifier.classifyRequest(request)
    if (namespace === undefined) {
        return undefined
    }
    return context.enterSubsegment(namespace)
}
