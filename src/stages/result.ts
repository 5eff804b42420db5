import { ErrorKind, StageResult } from '../types';

export function ok(stage: string, message: string, missing?: string[]): StageResult {
  return missing && missing.length > 0 ? { stage, status: 'ok', message, missing } : { stage, status: 'ok', message };
}

export function warning(stage: string, message: string, kind: ErrorKind, missing?: string[]): StageResult {
  return { stage, status: 'warning', message, kind, ...(missing ? { missing } : {}) };
}

export function fatal(stage: string, message: string, kind: ErrorKind, missing?: string[]): StageResult {
  return { stage, status: 'fatal', message, kind, ...(missing ? { missing } : {}) };
}

export function isFatal(result: StageResult): boolean {
  return result.status === 'fatal';
}
