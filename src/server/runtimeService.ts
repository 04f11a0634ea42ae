/**
 * Runtime Service - wire contract for the remote bridge
 *
 * Other Forthic runtimes call into this one through four request/response
 * operations. Every message is plain JSON; field names follow the
 * cross-runtime protocol (snake_case), and values travel as a one-of
 * record keyed by variant.
 */

// ============================================================
// VALUES
// ============================================================

export type WireFloat = number | 'NaN' | 'Infinity' | '-Infinity';

export interface WireField {
  key: string;
  value: WireValue;
}

/**
 * One stack value. Exactly one key is present.
 *
 * `int_value` is a decimal string so integers keep full precision.
 */
export type WireValue =
  | { int_value: string }
  | { float_value: WireFloat }
  | { bool_value: boolean }
  | { string_value: string }
  | { null_value: Record<string, never> }
  | { array_value: { items: WireValue[] } }
  | { record_value: { fields: WireField[] } }
  | { instant_value: { iso8601: string } }
  | { plain_date_value: { iso8601_date: string } }
  | { zoned_datetime_value: { iso8601: string; timezone: string } };

// ============================================================
// ERRORS
// ============================================================

export interface ErrorInfo {
  message: string;
  /** Runtime that raised the failure */
  runtime: string;
  stack_trace: string[];
  /** Error class name, e.g. UnknownWordError */
  error_type: string;
  word_location?: string;
  module_name?: string;
  context: Record<string, string>;
}

// ============================================================
// REQUESTS / RESPONSES
// ============================================================

export interface ExecuteWordRequest {
  word_name: string;
  stack: WireValue[];
}

export interface ExecuteWordResponse {
  result_stack: WireValue[];
  error?: ErrorInfo;
}

export interface ExecuteSequenceRequest {
  word_names: string[];
  stack: WireValue[];
}

export interface ExecuteSequenceResponse {
  result_stack: WireValue[];
  error?: ErrorInfo;
}

export type ListModulesRequest = Record<string, never>;

export interface WireModuleSummary {
  name: string;
  description: string;
  word_count: number;
  runtime_specific: boolean;
}

export interface ListModulesResponse {
  modules: WireModuleSummary[];
}

export interface GetModuleInfoRequest {
  module_name: string;
}

export interface WordInfo {
  name: string;
  stack_effect: string;
  description: string;
}

export interface GetModuleInfoResponse {
  name: string;
  description: string;
  words: WordInfo[];
}

// ============================================================
// SERVICE CONTRACT
// ============================================================

export type RuntimeMethod = 'ExecuteWord' | 'ExecuteSequence' | 'ListModules' | 'GetModuleInfo';

export const RUNTIME_METHODS: readonly RuntimeMethod[] = ['ExecuteWord', 'ExecuteSequence', 'ListModules', 'GetModuleInfo'];

export function isRuntimeMethod(name: string): name is RuntimeMethod {
  return RUNTIME_METHODS.some(m => m === name);
}

/**
 * Execution failures come back inside the response (`error`), never thrown.
 * GetModuleInfo throws ModuleImportError for an unknown module.
 */
export interface IRuntimeService {
  executeWord(request: ExecuteWordRequest): Promise<ExecuteWordResponse>;
  executeSequence(request: ExecuteSequenceRequest): Promise<ExecuteSequenceResponse>;
  listModules(request?: ListModulesRequest): Promise<ListModulesResponse>;
  getModuleInfo(request: GetModuleInfoRequest): Promise<GetModuleInfoResponse>;
}

// ============================================================
// WEBSOCKET FRAMES
// ============================================================

export interface RpcCall {
  id: string | number;
  method: RuntimeMethod;
  request: unknown;
}

export type RpcReply =
  | { id: string | number | null; response: unknown }
  | { id: string | number | null; error: ErrorInfo };
