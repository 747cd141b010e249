/**
 * Copyright 2026 Arm Limited
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import * as yaml from 'yaml';
import { isIntTypeName } from '../checked-int/int-types';
import { isLogLevel, logger } from '../logger';
import { FileReader, NodeFileReader } from './file-reader';
import { resolveSettings, type CheckedIntSettings } from './settings';

const ROOT_NODE = 'checked-int';
const KNOWN_KEYS = new Set(['default-type', 'log-level', 'log-failures']);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SettingsReader {
    constructor(private reader: FileReader = new NodeFileReader()) {}

    public async parse(filePath: string): Promise<CheckedIntSettings> {
        const fileContents = await this.reader.readFileToString(filePath);
        return this.parseContents(fileContents, filePath);
    }

    public parseContents(fileContents: string, filePath: string): CheckedIntSettings {
        let fileRoot: unknown;
        try {
            fileRoot = yaml.parse(fileContents);
        } catch (error) {
            throw new Error(`Invalid settings file: ${filePath} (${error instanceof Error ? error.message : String(error)})`);
        }
        const node = isRecord(fileRoot) ? fileRoot[ROOT_NODE] : undefined;
        if (!isRecord(node)) {
            throw new Error(`Invalid settings file: ${filePath}`);
        }

        const overrides: Partial<CheckedIntSettings> = {};
        const defaultType = node['default-type'];
        if (defaultType !== undefined) {
            if (typeof defaultType !== 'string' || !isIntTypeName(defaultType)) {
                throw new Error(`Invalid 'default-type' in ${filePath}: ${String(defaultType)}`);
            }
            overrides.defaultType = defaultType;
        }
        const logLevel = node['log-level'];
        if (logLevel !== undefined) {
            if (!isLogLevel(logLevel)) {
                throw new Error(`Invalid 'log-level' in ${filePath}: ${String(logLevel)}`);
            }
            overrides.logLevel = logLevel;
        }
        const logFailures = node['log-failures'];
        if (logFailures !== undefined) {
            if (typeof logFailures !== 'boolean') {
                throw new Error(`Invalid 'log-failures' in ${filePath}: ${String(logFailures)}`);
            }
            overrides.logFailures = logFailures;
        }

        for (const key of Object.keys(node)) {
            if (!KNOWN_KEYS.has(key)) {
                logger.warn(`Ignoring unknown setting '${key}' in ${filePath}`);
            }
        }
        return resolveSettings(overrides);
    }
}
