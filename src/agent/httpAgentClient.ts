import { AgentServiceError, errorMessage, isAbortError } from '../errors';
import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import { AgentResponseSchema, type AgentRequest, type AgentResponse, type AgentService } from './types';

export interface HttpAgentClientOptions {
  baseUrl: string;
  assistantId: string;
  apiKey?: string;
  timeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
}

const RETRY_MAX_MS = 3000;

function shouldRetryStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

async function readResponseText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `<<failed to read response body: ${errorMessage(error)}>>`;
  }
}

/**
 * Client for a LangGraph-style agent server: one thread per call session, each turn a
 * blocking run (`POST /threads/{id}/runs/wait`).
 */
export class HttpAgentClient implements AgentService {
  public readonly id = 'agent_http';
  private readonly options: HttpAgentClientOptions;

  constructor(options: HttpAgentClientOptions) {
    this.options = { ...options, baseUrl: options.baseUrl.replace(/\/$/, '') };
  }

  public async respond(request: AgentRequest, signal?: AbortSignal): Promise<AgentResponse> {
    const attempts = this.options.maxRetries + 1;
    let lastError: AgentServiceError | undefined;

    for (let attempt = 0; attempt < attempts; attempt += 1) {
      if (signal?.aborted) {
        throw new AgentServiceError('agent request aborted');
      }
      try {
        return await this.attempt(request, attempt, signal);
      } catch (error) {
        const agentError =
          error instanceof AgentServiceError
            ? error
            : new AgentServiceError(errorMessage(error), { cause: error, retryable: true });
        lastError = agentError;

        if (!agentError.retryable || attempt === attempts - 1 || signal?.aborted) {
          break;
        }
        const waitMs =
          Math.min(RETRY_MAX_MS, this.options.retryBackoffMs * Math.pow(2, attempt)) +
          Math.floor(Math.random() * 100);
        log.warn(
          {
            event: 'agent_retry',
            session_id: request.sessionId,
            attempt,
            wait_ms: waitMs,
            status: agentError.status,
            error_message: agentError.message,
          },
          'agent request failed, retrying',
        );
        await sleep(waitMs, signal);
      }
    }

    throw lastError ?? new AgentServiceError('agent request failed');
  }

  private async attempt(request: AgentRequest, attempt: number, signal?: AbortSignal): Promise<AgentResponse> {
    const url = `${this.options.baseUrl}/threads/${encodeURIComponent(request.sessionId)}/runs/wait`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const end = startStageTimer('agent');

    try {
      const headers: Record<string, string> = {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      };
      if (this.options.apiKey) {
        headers['x-api-key'] = this.options.apiKey;
      }

      const response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          assistant_id: this.options.assistantId,
          if_not_exists: 'create',
          input: {
            transcript: request.transcript,
            context: request.context,
            tool_results: request.toolResults ?? [],
          },
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await readResponseText(response);
        const preview = body.length > 500 ? `${body.slice(0, 500)}...` : body;
        throw new AgentServiceError(`agent request failed ${response.status}: ${preview}`, {
          status: response.status,
          retryable: shouldRetryStatus(response.status),
        });
      }

      let json: unknown;
      try {
        json = await response.json();
      } catch (error) {
        throw new AgentServiceError('agent returned invalid json', { cause: error });
      }

      const parsed = AgentResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new AgentServiceError(`agent response rejected: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      }

      const elapsedMs = end();
      log.info(
        {
          event: 'agent_response',
          session_id: request.sessionId,
          attempt,
          elapsed_ms: Math.round(elapsedMs),
          tool_calls: parsed.data.toolCalls.map((call) => call.name),
          text_length: parsed.data.text.length,
        },
        'agent responded',
      );
      return parsed.data;
    } catch (error) {
      incStageError('agent');
      if (error instanceof AgentServiceError) throw error;
      if (isAbortError(error)) {
        const timedOut = !signal?.aborted;
        throw new AgentServiceError(timedOut ? `agent timed out after ${this.options.timeoutMs}ms` : 'agent request aborted', {
          cause: error,
          retryable: timedOut,
        });
      }
      throw new AgentServiceError(`agent request failed: ${errorMessage(error)}`, { cause: error, retryable: true });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
