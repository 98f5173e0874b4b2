/**
 * hoststate — Single entry point for state operations
 *
 * `{ action, path?, value?, force_scan?, document? }` を受け取り、
 * 成功ペイロードまたはコード付きの構造化エラーを返す。
 * ツールルーティング層（MCP ツール）はここだけを呼ぶ。
 */

import type { CompareResult, StateAction } from '../types/state.js';
import { toStateValue } from '../types/value.js';
import type { ErrorPayload } from '../types/errors.js';
import { ValidationError, toErrorPayload, withAction } from '../types/errors.js';
import { toSerialized } from '../db/document.js';
import { isEmptyDiff } from './diff.js';
import type { StateManager } from './state-manager.js';

export interface StateRequest {
  action: StateAction;
  path?: string;
  value?: unknown;
  force_scan?: boolean;
  /** JSON text or object, for import and diff. */
  document?: unknown;
  timeout_ms?: number;
  signal?: AbortSignal;
}

export type StateResponse =
  | { ok: true; action: StateAction; message: string; data: Record<string, unknown> }
  | { ok: false; action: StateAction; error: ErrorPayload };

function compareData(result: CompareResult): Record<string, unknown> {
  return {
    drift: !isEmptyDiff(result.diff),
    summary: result.summary,
    diff: result.diff,
    categories: result.categories,
    stored_at: result.storedAt,
  };
}

function compareMessage(result: CompareResult): string {
  if (result.summary.total === 0) {
    return 'No differences found - stored state is up to date';
  }
  const { added, changed, removed } = result.summary;
  return `Configuration drift detected: ${added} added, ${changed} changed, ${removed} removed`;
}

function requirePath(request: StateRequest): string {
  if (request.path === undefined || request.path === '') {
    throw new ValidationError('MISSING_PARAMETER', `path is required for ${request.action}`);
  }
  return request.path;
}

function requireDocument(request: StateRequest): unknown {
  if (request.document === undefined) {
    throw new ValidationError('MISSING_PARAMETER', `document is required for ${request.action}`);
  }
  return request.document;
}

async function dispatch(
  manager: StateManager,
  request: StateRequest,
): Promise<{ message: string; data: Record<string, unknown> }> {
  const scan = {
    ...(request.timeout_ms !== undefined ? { timeoutMs: request.timeout_ms } : {}),
    ...(request.signal !== undefined ? { signal: request.signal } : {}),
  };

  switch (request.action) {
    case 'load': {
      const result = await manager.load();
      if (result.status === 'not_found') {
        return { message: 'No cached state - run save first', data: { state: null } };
      }
      return { message: 'State loaded successfully', data: { state: toSerialized(result.document) } };
    }

    case 'save': {
      const result = await manager.save({ ...scan, forceScan: request.force_scan ?? false });
      return {
        message: 'State saved successfully',
        data: { state: toSerialized(result.document), scanned: result.scanned, from_cache: result.fromCache },
      };
    }

    case 'update': {
      const path = requirePath(request);
      if (request.value === undefined) {
        throw new ValidationError('MISSING_PARAMETER', 'value is required for update');
      }
      const parsed = toStateValue(request.value);
      if (!parsed.ok) {
        throw new ValidationError('INCOMPATIBLE_VALUE', `Value is not storable: ${parsed.error}`, { path });
      }
      const document = await manager.update(path, parsed.value);
      return {
        message: `Field ${path} updated successfully`,
        data: { path, value: parsed.value, state: toSerialized(document) },
      };
    }

    case 'compare': {
      const result = await manager.compare(scan);
      return { message: compareMessage(result), data: compareData(result) };
    }

    case 'diff': {
      const result = await manager.diff(requireDocument(request));
      return { message: compareMessage(result), data: compareData(result) };
    }

    case 'export': {
      const chunks: string[] = [];
      await manager.exportDocument({ write: (chunk) => void chunks.push(chunk) });
      return { message: 'State exported', data: { document: chunks.join('') } };
    }

    case 'import': {
      const document = await manager.importDocument(requireDocument(request));
      return { message: 'State imported successfully', data: { state: toSerialized(document) } };
    }

    case 'watch': {
      const result = await manager.watch(requirePath(request));
      return {
        message: `Current value of ${result.path}`,
        data: {
          path: result.path,
          value: result.value,
          captured_at: result.capturedAt,
          source: result.source,
        },
      };
    }

    default: {
      const _exhaustive: never = request.action;
      throw new ValidationError('UNKNOWN_ACTION', `Unknown action: ${String(_exhaustive)}`);
    }
  }
}

/** Run one state request. Never throws: failures come back as `{ ok: false }`. */
export async function executeStateRequest(
  manager: StateManager,
  request: StateRequest,
): Promise<StateResponse> {
  try {
    const { message, data } = await dispatch(manager, request);
    return { ok: true, action: request.action, message, data };
  } catch (err) {
    return { ok: false, action: request.action, error: toErrorPayload(withAction(err, request.action)) };
  }
}
