import {
  AutoStepOptions,
  DEFAULT_AUTO_STEP_OPTIONS,
} from '../autostep/autoStepController';
import {
  BackpressurePolicy,
  DEFAULT_BACKPRESSURE_POLICY,
} from '../framing/backpressurePolicy';

export interface ProxyConfig {
  listenHost: string;
  listenPort: number;
  backendHost: string;
  backendPort: number;
  /** Backend connection attempts per client session. */
  dialRetries: number;
  dialDelayMs: number;
  connectTimeoutMs: number;
  /** Absolute lifetime of a session; 0 disables it. */
  sessionTimeoutMs: number;
  keepAliveMs: number;
  backpressure: BackpressurePolicy;
  autoStep: AutoStepOptions;
  detectStackTraceByContent: boolean;
}

export type ProxyConfigOverrides = Partial<
  Omit<ProxyConfig, 'backpressure' | 'autoStep'>
> & {
  backpressure?: Partial<BackpressurePolicy>;
  autoStep?: Partial<AutoStepOptions>;
};

export const DEFAULT_PROXY_CONFIG: Readonly<ProxyConfig> = {
  listenHost: '127.0.0.1',
  listenPort: 60000,
  backendHost: '127.0.0.1',
  backendPort: 2345,
  dialRetries: 3,
  dialDelayMs: 1000,
  connectTimeoutMs: 10000,
  sessionTimeoutMs: 30 * 60 * 1000,
  keepAliveMs: 30000,
  backpressure: DEFAULT_BACKPRESSURE_POLICY,
  autoStep: DEFAULT_AUTO_STEP_OPTIONS,
  detectStackTraceByContent: false,
};

export function resolveProxyConfig(overrides: ProxyConfigOverrides = {}): ProxyConfig {
  const { backpressure, autoStep, ...rest } = overrides;
  return {
    ...DEFAULT_PROXY_CONFIG,
    ...rest,
    backpressure: { ...DEFAULT_PROXY_CONFIG.backpressure, ...backpressure },
    autoStep: { ...DEFAULT_PROXY_CONFIG.autoStep, ...autoStep },
  };
}
