import { ToolError, errorMessage, isAbortError } from '../errors';
import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import { defaultToolHandlers } from './handlers';
import {
  isToolName,
  toolArgSchemas,
  type ToolCall,
  type ToolContext,
  type ToolHandler,
  type ToolHandlers,
  type ToolName,
  type ToolOutput,
} from './types';

export interface ToolRegistryOptions {
  timeoutMs: number;
  handlers?: Partial<ToolHandlers>;
}

/** Single dispatch table for every tool; each execution is bounded by `timeoutMs`. */
export class ToolRegistry {
  private readonly timeoutMs: number;
  private readonly handlers: ToolHandlers;

  constructor(options: ToolRegistryOptions) {
    this.timeoutMs = options.timeoutMs;
    this.handlers = { ...defaultToolHandlers, ...(options.handlers ?? {}) };
  }

  public names(): ToolName[] {
    return Object.keys(toolArgSchemas).filter(isToolName);
  }

  /** Runs one tool call. Every failure, including a timeout, surfaces as a ToolError. */
  public async execute(call: ToolCall, ctx: ToolContext): Promise<ToolOutput> {
    if (!isToolName(call.name)) {
      throw new ToolError(call.name, `unknown tool "${call.name}"`);
    }
    const name = call.name;

    const controller = new AbortController();
    const onParentAbort = (): void => controller.abort();
    if (ctx.signal.aborted) controller.abort();
    ctx.signal.addEventListener('abort', onParentAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ToolError(name, `timed out after ${this.timeoutMs}ms`, { timedOut: true }));
      }, this.timeoutMs);
    });

    const end = startStageTimer('tool');
    try {
      return await Promise.race([this.run(name, call.args, { ...ctx, signal: controller.signal }), timeout]);
    } catch (error) {
      incStageError('tool');
      const toolError =
        error instanceof ToolError
          ? error
          : new ToolError(name, isAbortError(error) ? 'aborted' : errorMessage(error), { cause: error });
      log.warn(
        {
          ...ctx.logContext,
          event: 'tool_failed',
          tool: name,
          tool_call_id: call.id,
          timed_out: toolError.timedOut,
          err: toolError,
        },
        'tool failed',
      );
      throw toolError;
    } finally {
      const durationMs = end();
      clearTimeout(timer);
      ctx.signal.removeEventListener('abort', onParentAbort);
      log.debug(
        { ...ctx.logContext, event: 'tool_executed', tool: name, duration_ms: Math.round(durationMs) },
        'tool executed',
      );
    }
  }

  private async run<N extends ToolName>(name: N, rawArgs: unknown, ctx: ToolContext): Promise<ToolOutput> {
    const parsed = toolArgSchemas[name].safeParse(rawArgs);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
      throw new ToolError(name, `invalid arguments: ${detail}`);
    }
    const handler: ToolHandler<N> = this.handlers[name];
    return handler(parsed.data, ctx);
  }
}
