import { env } from '../env';
import { errorMessage } from '../errors';
import { log } from '../log';
import { getRedisClient } from '../redis/client';
import type { CallOutcomeRecord, OutcomeSink } from './types';

export class LogOutcomeSink implements OutcomeSink {
  public readonly name = 'log';

  public async record(outcome: CallOutcomeRecord): Promise<void> {
    log.info(
      {
        event: 'call_outcome',
        session_id: outcome.sessionId,
        call_sid: outcome.callSid,
        stream_sid: outcome.streamSid,
        outcome: outcome.outcome,
        reason: outcome.reason,
        duration_ms: outcome.durationMs,
        turns: outcome.turns,
        tool_invocations: outcome.toolInvocations.length,
        notes: outcome.notes,
      },
      'call outcome',
    );
  }
}

/** The list command the sink issues; an ioredis client satisfies it. */
export interface OutcomeListRedis {
  lpush(key: string, value: string): Promise<number>;
}

/** Pushes each record as JSON onto a Redis list for the call-log consumer. */
export class RedisOutcomeSink implements OutcomeSink {
  public readonly name = 'redis';
  private readonly redis: OutcomeListRedis;
  private readonly listKey: string;

  constructor(options: { redis?: OutcomeListRedis; listKey?: string } = {}) {
    this.redis = options.redis ?? getRedisClient();
    this.listKey = options.listKey ?? env.OUTCOME_LIST_KEY;
  }

  public async record(outcome: CallOutcomeRecord): Promise<void> {
    const length = await this.redis.lpush(this.listKey, JSON.stringify(outcome));
    log.debug(
      { event: 'call_outcome_stored', session_id: outcome.sessionId, list_key: this.listKey, list_length: length },
      'call outcome stored',
    );
  }
}

/** Fans a record out to every sink; one failing sink doesn't stop the others. */
export class CompositeOutcomeSink implements OutcomeSink {
  public readonly name: string;

  constructor(private readonly sinks: OutcomeSink[]) {
    this.name = sinks.map((sink) => sink.name).join('+');
  }

  public async record(outcome: CallOutcomeRecord): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map((sink) => sink.record(outcome)));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        log.error(
          {
            event: 'outcome_sink_failed',
            sink: this.sinks[index]?.name,
            session_id: outcome.sessionId,
            err: result.reason,
            error_message: errorMessage(result.reason),
          },
          'outcome sink failed',
        );
      }
    });
  }
}

export function createOutcomeSink(): OutcomeSink {
  return new CompositeOutcomeSink([new LogOutcomeSink(), new RedisOutcomeSink()]);
}
