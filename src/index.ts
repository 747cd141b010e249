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

export * from './checked-int/int-types';
export * from './checked-int/primitive-checks';
export * from './checked-int/cast-safety';
export * from './checked-int/dispatch';
export * from './checked-int/format-parser';
export * from './checked-int/format-evaluator';
export { EvaluatorDiagnostics } from './checked-int/evaluator-diagnostics';
export * from './config/settings';
export { SettingsReader } from './config/settings-reader';
export { NodeFileReader, type FileReader } from './config/file-reader';
export { logger, setLogLevel, isLogLevel, LOG_LEVELS, type LogLevel } from './logger';
