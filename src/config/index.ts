import dotenv from 'dotenv';
import os from 'os';

dotenv.config();

export type Config = {
  pve: {
    url: string;
    tokenId: string;
    tokenSecret: string;
    node: string;
    insecureTls: boolean;
    taskTimeoutMs: number;
    taskPollIntervalMs: number;
  };
  provisioning: {
    templateStorage: string;
    bridge: string;
    kernelModules: string[];
    ipWaitTimeoutMs: number;
  };
  broker?: {
    url: string;
    resultsExchange: string;
    connectAttempts: number;
    agentId: string;
  };
};

type Env = Record<string, string | undefined>;

const getEnv = (env: Env, key: string, fallback?: string): string => {
  const value = env[key] ?? fallback;
  if (!value) {
    throw new Error(`Missing required env var ${key}`);
  }
  return value;
};

const getEnvOptional = (env: Env, key: string): string | undefined => {
  const value = env[key];
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const toNumber = (value: string, key: string): number => {
  const parsed = Number(value);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`Env var ${key} must be a non-negative number`);
  }
  return parsed;
};

const toBoolean = (value: string, key: string): boolean => {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y'].includes(normalized)) return true;
  if (['false', '0', 'no', 'n'].includes(normalized)) return false;
  throw new Error(`Env var ${key} must be boolean-like (true/false)`);
};

const toList = (value: string): string[] =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

export function loadConfig(env: Env = process.env): Config {
  const brokerUrl = getEnvOptional(env, 'BROKER_URL');

  return {
    pve: {
      url: getEnv(env, 'PVE_API_URL', 'https://localhost:8006'),
      tokenId: getEnv(env, 'PVE_TOKEN_ID'),
      tokenSecret: getEnv(env, 'PVE_TOKEN_SECRET'),
      node: getEnv(env, 'PVE_NODE', os.hostname()),
      insecureTls: toBoolean(getEnv(env, 'PVE_INSECURE_TLS', 'true'), 'PVE_INSECURE_TLS'),
      taskTimeoutMs: toNumber(getEnv(env, 'PVE_TASK_TIMEOUT_MS', '0'), 'PVE_TASK_TIMEOUT_MS'),
      taskPollIntervalMs: toNumber(
        getEnv(env, 'PVE_TASK_POLL_INTERVAL_MS', '1000'),
        'PVE_TASK_POLL_INTERVAL_MS'
      ),
    },
    provisioning: {
      templateStorage: getEnv(env, 'TEMPLATE_STORAGE', 'local'),
      bridge: getEnv(env, 'NETWORK_BRIDGE', 'vmbr0'),
      kernelModules: toList(env.KERNEL_MODULES ?? 'overlay'),
      ipWaitTimeoutMs: toNumber(getEnv(env, 'IP_WAIT_TIMEOUT_MS', '30000'), 'IP_WAIT_TIMEOUT_MS'),
    },
    broker: brokerUrl
      ? {
          url: brokerUrl,
          resultsExchange: getEnv(env, 'RESULTS_EXCHANGE', 'results'),
          connectAttempts: toNumber(getEnv(env, 'BROKER_CONNECT_ATTEMPTS', '3'), 'BROKER_CONNECT_ATTEMPTS'),
          agentId: getEnv(env, 'SERVICE_NAME', `lxc-provisioner@${os.hostname()}`),
        }
      : undefined,
  };
}
