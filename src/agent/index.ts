import { env } from '../env';
import { log } from '../log';
import { HttpAgentClient } from './httpAgentClient';
import { LocalRuleAgent } from './localRuleAgent';
import type { AgentService } from './types';

export function createAgentService(): AgentService {
  if (!env.AGENT_URL) {
    log.info({ event: 'agent_route', source: 'agent_local_rules', has_agent_url: false }, 'agent routed to local rules');
    return new LocalRuleAgent();
  }
  log.info({ event: 'agent_route', source: 'agent_http', has_agent_url: true }, 'agent routed to http');
  return new HttpAgentClient({
    baseUrl: env.AGENT_URL,
    assistantId: env.AGENT_ASSISTANT_ID,
    apiKey: env.AGENT_API_KEY,
    timeoutMs: env.AGENT_TIMEOUT_MS,
    maxRetries: env.AGENT_MAX_RETRIES,
    retryBackoffMs: env.AGENT_RETRY_BACKOFF_MS,
  });
}
