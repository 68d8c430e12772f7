export interface GatekeeperOptions {
  jwtSecret: string;
  /** Absolute directory under which upload presets place their files */
  uploadRoot: string;
  sweepIntervalMs: number;
  requestTimeoutMs: number;
  trustProxy: boolean;
}
