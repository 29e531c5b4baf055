/**
 * Tool adapter: turns a declarative {@link ToolSpec} into a callable tool.
 *
 * Every tool wraps exactly one agent-kit operation. Invocation parses the raw
 * payload, validates it against the tool's schema, hands the typed arguments
 * to the tool's `run` mapping and wraps whatever happens in a
 * {@link ToolResult}. Nothing thrown along the way escapes `execute`.
 */

import { ToolError, UnsupportedOperationError, toFailure } from '../errors.js';
import type { KitMethod, SolanaAgentKit } from '../kit/interface.js';
import { logger } from '../logger.js';
import type { InferInput, ToolSchema } from '../schema/interface.js';
import { toJsonSchema, type JsonSchemaObject } from '../schema/json-schema.js';
import { isRecord, validateInput } from '../schema/validator.js';

// ---- Type definitions -------------------------------------------------------

/** Result-specific payload of a successful invocation. */
export type ToolData = Record<string, unknown>;

export interface ToolSuccess {
  status: 'success';
  message: string;
  data: ToolData;
}

export interface ToolFailure {
  status: 'error';
  message: string;
  code: string;
}

/** Standardised result returned by every tool invocation. */
export type ToolResult = ToolSuccess | ToolFailure;

/**
 * How the raw payload is read:
 * - `json`: a JSON object (an empty payload is `{}`)
 * - `text`: the trimmed payload becomes the `input` field
 * - `none`: the payload is ignored
 */
export type InputMode = 'json' | 'text' | 'none';

/** Declaration of one tool. */
export interface ToolSpec<S extends ToolSchema, M extends KitMethod> {
  /** Public snake_case name. */
  name: string;
  /** Shown to the orchestrating agent; documents the expected input and output keys. */
  description: string;
  input?: InputMode;
  schema: S;
  /** The kit method `run` calls. */
  delegate: M;
  /** Defaults to `Success`. */
  successMessage?: string | ((data: ToolData) => string);
  /** Map validated arguments onto the delegate call and shape its result. */
  run(kit: Pick<SolanaAgentKit, M>, args: InferInput<S>): Promise<ToolData>;
}

/** A kit-independent, immutable tool. */
export interface ToolDefinition<M extends KitMethod = KitMethod> {
  readonly name: string;
  readonly description: string;
  readonly input: InputMode;
  readonly schema: ToolSchema;
  readonly delegate: M;
  /** JSON Schema of the accepted payload. */
  readonly parameters: JsonSchemaObject;
  execute(kit: Pick<SolanaAgentKit, M>, raw: string): Promise<ToolResult>;
}

export type CheckResult =
  | { ok: true; input: Record<string, unknown> }
  | { ok: false; message: string; code: string };

// ---- Payload handling -------------------------------------------------------

function parsePayload(mode: InputMode, raw: string): Record<string, unknown> {
  switch (mode) {
    case 'none':
      return {};
    case 'text': {
      const text = raw.trim();
      return text ? { input: text } : {};
    }
    case 'json': {
      if (raw.trim() === '') return {};
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ToolError(`Invalid JSON input: ${reason}`, 'INVALID_JSON');
      }
      if (!isRecord(parsed)) {
        throw new ToolError('Input must be a JSON object', 'INVALID_JSON');
      }
      return parsed;
    }
  }
}

function failure(err: unknown): ToolFailure {
  const { message, code } = toFailure(err);
  return { status: 'error', message, code };
}

function freezeSchema(schema: ToolSchema): void {
  for (const field of Object.values(schema)) {
    Object.freeze(field.type);
    Object.freeze(field);
  }
  Object.freeze(schema);
}

// ---- Public API -------------------------------------------------------------

/** Build an immutable tool from its declaration. */
export function defineTool<const S extends ToolSchema, M extends KitMethod>(
  spec: ToolSpec<S, M>,
): ToolDefinition<M> {
  const mode = spec.input ?? 'json';
  const successMessage = spec.successMessage ?? 'Success';
  freezeSchema(spec.schema);

  return Object.freeze({
    name: spec.name,
    description: spec.description,
    input: mode,
    schema: spec.schema,
    delegate: spec.delegate,
    parameters: toJsonSchema(spec.schema),

    async execute(kit: Pick<SolanaAgentKit, M>, raw: string): Promise<ToolResult> {
      logger.debug(`${spec.name}: invoked`);
      try {
        const input = parsePayload(mode, raw);
        validateInput(input, spec.schema);
        if (typeof kit[spec.delegate] !== 'function') {
          throw new ToolError(`Agent kit does not implement ${spec.delegate}`, 'NOT_SUPPORTED');
        }
        const data = await spec.run(kit, input);
        const message = typeof successMessage === 'function' ? successMessage(data) : successMessage;
        return { status: 'success', message, data };
      } catch (err) {
        const result = failure(err);
        logger.warn(`${spec.name} failed [${result.code}]: ${result.message}`);
        return result;
      }
    },
  });
}

/**
 * Parse and validate a payload without calling the kit.
 */
export function checkInput(definition: ToolDefinition, raw: string): CheckResult {
  try {
    const input = parsePayload(definition.input, raw);
    validateInput(input, definition.schema);
    return { ok: true, input };
  } catch (err) {
    return { ok: false, ...toFailure(err) };
  }
}

/** A tool definition bound to one agent kit. */
export class SolanaTool<M extends KitMethod = KitMethod> {
  constructor(
    readonly definition: ToolDefinition<M>,
    private readonly kit: Pick<SolanaAgentKit, M>,
  ) {}

  get name(): string {
    return this.definition.name;
  }

  get description(): string {
    return this.definition.description;
  }

  get parameters(): JsonSchemaObject {
    return this.definition.parameters;
  }

  /** Run the tool. Always resolves; failures come back as error results. */
  invoke(raw = ''): Promise<ToolResult> {
    return this.definition.execute(this.kit, raw);
  }

  /** Synchronous execution is not supported by any tool. */
  invokeSync(_raw?: string): never {
    throw new UnsupportedOperationError();
  }
}
