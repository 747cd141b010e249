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

import type { IntTypeName } from '../checked-int/int-types';
import { logger, setLogLevel, type LogLevel } from '../logger';

export interface CheckedIntSettings {
    /** Leading type of a format program that does not name one. */
    defaultType: IntTypeName;
    logLevel: LogLevel;
    /** Log the diagnostics of every failed format evaluation at debug level. */
    logFailures: boolean;
}

export const DEFAULT_SETTINGS: Readonly<CheckedIntSettings> = {
    defaultType: 's32',
    logLevel: 'warn',
    logFailures: true,
};

export function resolveSettings(overrides: Partial<CheckedIntSettings> = {}): CheckedIntSettings {
    return { ...DEFAULT_SETTINGS, ...overrides };
}

let activeSettings: CheckedIntSettings = resolveSettings();

export function getActiveSettings(): Readonly<CheckedIntSettings> {
    return activeSettings;
}

/** Makes `settings` the defaults for new evaluators and sets the log level. */
export function applySettings(settings: CheckedIntSettings): void {
    activeSettings = { ...settings };
    setLogLevel(settings.logLevel);
    logger.debug(`Settings applied: defaultType=${settings.defaultType}, logFailures=${settings.logFailures}`);
}
