import { env } from '../env';
import { log } from '../log';
import { getRedisClient } from '../redis/client';

const LUA_CAPACITY_SCRIPT = `
local globalKey = KEYS[1]
local lineKey = KEYS[2]
local rpmKey = KEYS[3]
local lineConcurrencyKey = KEYS[4]
local lineRpmKey = KEYS[5]

local callSid = ARGV[1]
local globalCap = tonumber(ARGV[2])
local lineCapDefault = tonumber(ARGV[3])
local lineRpmDefault = tonumber(ARGV[4])
local ttlSeconds = tonumber(ARGV[5])

local function readCap(key, fallback)
  local value = redis.call('GET', key)
  if value then
    local parsed = tonumber(value)
    if parsed and parsed > 0 then
      return parsed
    end
  end
  return fallback
end

local lineCap = readCap(lineConcurrencyKey, lineCapDefault)
local lineRpmCap = readCap(lineRpmKey, lineRpmDefault)

local inGlobal = redis.call('SISMEMBER', globalKey, callSid)
local inLine = redis.call('SISMEMBER', lineKey, callSid)
if inGlobal == 1 or inLine == 1 then
  redis.call('SADD', globalKey, callSid)
  redis.call('SADD', lineKey, callSid)
  redis.call('EXPIRE', globalKey, ttlSeconds)
  redis.call('EXPIRE', lineKey, ttlSeconds)
  return 'OK'
end

local globalCount = redis.call('SCARD', globalKey)
if globalCount >= globalCap then
  return 'global_at_capacity'
end

local lineCount = redis.call('SCARD', lineKey)
if lineCount >= lineCap then
  return 'line_at_capacity'
end

local rpmCount = tonumber(redis.call('GET', rpmKey) or '0')
if rpmCount >= lineRpmCap then
  return 'line_rate_limited'
end

redis.call('SADD', globalKey, callSid)
redis.call('SADD', lineKey, callSid)
redis.call('EXPIRE', globalKey, ttlSeconds)
redis.call('EXPIRE', lineKey, ttlSeconds)
local nextCount = redis.call('INCR', rpmKey)
if nextCount == 1 then
  redis.call('EXPIRE', rpmKey, 120)
end

return 'OK'
`;

const FAILURE_REASONS = ['global_at_capacity', 'line_at_capacity', 'line_rate_limited'] as const;
export type CapacityFailureReason = (typeof FAILURE_REASONS)[number];

/** The Redis commands the limiter issues; an ioredis client satisfies it. */
export interface CapacityRedis {
  evalsha(sha: string, numKeys: number, ...args: string[]): Promise<unknown>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
  script(subcommand: 'LOAD', script: string): Promise<unknown>;
  srem(key: string, member: string): Promise<number>;
}

export interface CapacityParams {
  /** The dialled number the call came in on (or goes out from). */
  line: string;
  callSid: string;
  nowEpochMs?: number;
  requestId?: string;
  redis?: CapacityRedis;
  capDefaults?: CapacityDefaults;
}

export interface ReleaseParams {
  line: string;
  callSid: string;
  requestId?: string;
  redis?: CapacityRedis;
}

export interface CapacityDefaults {
  globalConcurrency?: number;
  lineConcurrency?: number;
  lineRpm?: number;
}

export type CapacityResult = { ok: true } | { ok: false; reason: CapacityFailureReason };

let scriptSha: string | null = null;

function isFailureReason(value: string): value is CapacityFailureReason {
  return FAILURE_REASONS.some((reason) => reason === value);
}

export function normalizeLine(line: string): string {
  const digits = line.replace(/[^\d+]/g, '');
  return digits === '' ? 'unknown' : digits;
}

/** Capacity is counted per business line: the number dialled in on, or dialled out from. */
export function lineForCall(direction: 'inbound' | 'outbound', from?: string, to?: string): string | undefined {
  return direction === 'inbound' ? to : from;
}

function formatMinuteKey(epochMs: number): string {
  const date = new Date(epochMs);
  const pad = (value: number): string => value.toString().padStart(2, '0');
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}${pad(
    date.getUTCHours(),
  )}${pad(date.getUTCMinutes())}`;
}

export function buildCapacityKeys(line: string, epochMs: number): {
  globalActiveKey: string;
  lineActiveKey: string;
  lineRpmKey: string;
  lineConcurrencyCapKey: string;
  lineRpmCapKey: string;
} {
  const id = normalizeLine(line);
  return {
    globalActiveKey: `${env.CAP_PREFIX}:global:active`,
    lineActiveKey: `${env.CAP_PREFIX}:line:${id}:active`,
    lineRpmKey: `${env.CAP_PREFIX}:line:${id}:rpm:${formatMinuteKey(epochMs)}`,
    lineConcurrencyCapKey: `${env.CAP_PREFIX}:line:${id}:cap:concurrency`,
    lineRpmCapKey: `${env.CAP_PREFIX}:line:${id}:cap:rpm`,
  };
}

function isNoScriptError(error: unknown): boolean {
  return error instanceof Error && error.message.toUpperCase().includes('NOSCRIPT');
}

async function evalCapacityScript(redis: CapacityRedis, keys: string[], args: string[]): Promise<unknown> {
  const numKeys = keys.length;

  if (scriptSha) {
    try {
      return await redis.evalsha(scriptSha, numKeys, ...keys, ...args);
    } catch (error) {
      if (!isNoScriptError(error)) {
        throw error;
      }
    }
  }

  try {
    const loadedSha = String(await redis.script('LOAD', LUA_CAPACITY_SCRIPT));
    scriptSha = loadedSha;
    return await redis.evalsha(loadedSha, numKeys, ...keys, ...args);
  } catch (error) {
    log.debug({ event: 'capacity_script_load_failed', err: error }, 'script load failed, using EVAL');
    return redis.eval(LUA_CAPACITY_SCRIPT, numKeys, ...keys, ...args);
  }
}

export async function tryAcquire(params: CapacityParams): Promise<CapacityResult> {
  const redis = params.redis ?? getRedisClient();
  const nowEpochMs = params.nowEpochMs ?? Date.now();
  const keys = buildCapacityKeys(params.line, nowEpochMs);
  const capDefaults = params.capDefaults;
  const args = [
    params.callSid,
    (capDefaults?.globalConcurrency ?? env.GLOBAL_CONCURRENCY_CAP).toString(),
    (capDefaults?.lineConcurrency ?? env.LINE_CONCURRENCY_CAP_DEFAULT).toString(),
    (capDefaults?.lineRpm ?? env.LINE_CALLS_PER_MIN_CAP_DEFAULT).toString(),
    env.CAPACITY_TTL_SECONDS.toString(),
  ];
  const logFields = {
    line: normalizeLine(params.line),
    call_sid: params.callSid,
    requestId: params.requestId,
  };

  let result: unknown;
  try {
    result = await evalCapacityScript(
      redis,
      [keys.globalActiveKey, keys.lineActiveKey, keys.lineRpmKey, keys.lineConcurrencyCapKey, keys.lineRpmCapKey],
      args,
    );
  } catch (error) {
    log.error({ err: error, event: 'capacity_eval_failed', ...logFields }, 'capacity evaluation failed');
    throw error;
  }

  if (result === 'OK') {
    log.info({ event: 'capacity_acquired', ...logFields }, 'capacity acquired');
    return { ok: true };
  }

  if (typeof result === 'string' && isFailureReason(result)) {
    log.warn({ event: 'capacity_denied', reason: result, ...logFields }, 'capacity denied');
    return { ok: false, reason: result };
  }

  log.error({ event: 'capacity_unknown_result', result, ...logFields }, 'capacity returned unknown result');
  return { ok: false, reason: 'line_rate_limited' };
}

export async function release(params: ReleaseParams): Promise<void> {
  const redis = params.redis ?? getRedisClient();
  const keys = buildCapacityKeys(params.line, Date.now());
  const logFields = {
    line: normalizeLine(params.line),
    call_sid: params.callSid,
    requestId: params.requestId,
  };

  try {
    const [removedGlobal, removedLine] = await Promise.all([
      redis.srem(keys.globalActiveKey, params.callSid),
      redis.srem(keys.lineActiveKey, params.callSid),
    ]);

    log.info(
      { event: 'capacity_released', removed_global: removedGlobal, removed_line: removedLine, ...logFields },
      'capacity released',
    );
  } catch (error) {
    log.error({ event: 'capacity_release_failed', err: error, ...logFields }, 'capacity release failed');
  }
}
