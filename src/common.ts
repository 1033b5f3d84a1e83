// SPDX-FileCopyrightText: 2025 Anaconda, Inc
// SPDX-License-Identifier: Apache-2.0

import { Configuration, InternalConfiguration, toImpl as toImplCfg } from './config.js';

/**
 * Base for the long-lived objects of this package (clients and contexts):
 * holds the resolved configuration and prints diagnostics.
 *
 * Diagnostics go to the console only. Nothing here ever throws into traced code.
 */
export class XRayCommon {
    config: InternalConfiguration

    protected constructor(config: Configuration | InternalConfiguration) {
        this.config = config instanceof InternalConfiguration ? config : toImplCfg(config)
    }

    protected get namePrefix(): string {
        return this.config.getNamePrefix()
    }

    protected debug(line: string) {
        if (this.config.getUseDebug()) {
            console.debug(`${localTimeString()} > *** XRAY DEBUG: ${line}`)
        }
    }

    protected warn(line: string) {
        console.warn(`${localTimeString()} > *** XRAY WARNING: ${line}`)
    }
}

export function localTimeString(): string {
    const d = new Date();
    const pad = (n: number, width = 2) => String(n).padStart(width, "0");

    const hh = pad(d.getHours());
    const mm = pad(d.getMinutes());
    const ss = pad(d.getSeconds());
    const ms = pad(d.getMilliseconds(), 3);

    return `${hh}:${mm}:${ss}.${ms}`;
}
