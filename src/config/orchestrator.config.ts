import { ConfigType, registerAs } from '@nestjs/config';

function parseInteger(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value >= 0 ? value : fallback;
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  return !['false', '0', 'no', 'off'].includes(raw.trim().toLowerCase());
}

export const orchestratorConfig = registerAs('orchestrator', () => ({
  port: parseInteger(process.env.PORT, 3000),
  corsOrigin: process.env.CORS_ORIGIN ?? '*',
  schedulerEnabled: parseBoolean(process.env.SCHEDULER_ENABLED, true),
  schedulerIntervalMs: parseInteger(process.env.SCHEDULER_INTERVAL_MS, 60_000), // 1 minute
  schedulerStartWindowMinutes: parseInteger(process.env.SCHEDULER_START_WINDOW_MINUTES, 5),
  collaboratorTimeoutMs: parseInteger(process.env.COLLABORATOR_TIMEOUT_MS, 30_000),
  sessionLingerMs: parseInteger(process.env.SESSION_LINGER_MS, 5_000),
}));

export type OrchestratorConfig = ConfigType<typeof orchestratorConfig>;
