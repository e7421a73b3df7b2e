// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import * as fs from 'fs';
import * as path from 'path';
import { wrapError } from '../utils/errors';
import { TrustBundleConfig, checkAndSetDefaults } from './model';
import { formatConfig } from './formatter';
import { parseConfig, resolvePlaceholders } from './parse';

/**
 * Read a manifest, check its invariants and resolve `{repo}` placeholders
 * against the manifest directory.
 */
export function loadConfig(configPath: string): TrustBundleConfig {
    let text: string;
    try {
        text = fs.readFileSync(configPath, 'utf8');
    } catch (error) {
        throw wrapError('failed to read config file', error);
    }

    const config = parseConfig(text);
    try {
        checkAndSetDefaults(config);
    } catch (error) {
        throw wrapError('invalid configuration', error);
    }

    resolvePlaceholders(config, path.dirname(configPath));
    return config;
}

/**
 * Write a manifest in canonical form, restoring `{repo}` placeholders.
 */
export function saveConfig(configPath: string, config: TrustBundleConfig): void {
    try {
        checkAndSetDefaults(config);
    } catch (error) {
        throw wrapError('invalid configuration', error);
    }

    const text = formatConfig(config, path.dirname(configPath));
    try {
        fs.writeFileSync(configPath, text, { mode: 0o644 });
    } catch (error) {
        throw wrapError('failed to write config file', error);
    }
}
