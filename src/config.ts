import { defaultRuleId, hasRule } from './rules/RuleRegistry';

export type ServerConfig = {
  port: number;
  ruleSet: string;
  /** true: reflect the request origin. */
  corsOrigin: string[] | true;
};

export const DEFAULT_PORT = 5174;

/** Reads the environment once at startup; bad values fall back to defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = Number(env.PORT || DEFAULT_PORT);
  const rule = String(env.RULESET ?? '').trim().toLowerCase();
  const origins = String(env.CORS_ORIGIN ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);

  return {
    port: Number.isInteger(port) && port > 0 && port < 65536 ? port : DEFAULT_PORT,
    ruleSet: rule && hasRule(rule) ? rule : defaultRuleId(),
    corsOrigin: origins.length > 0 ? origins : true,
  };
}
