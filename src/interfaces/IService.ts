// Base service interface for dependency injection

export type LogMeta = Record<string, unknown>;

export interface IService {
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
  isHealthy(): Promise<boolean>;
}

export interface ILogger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
}

export interface IConfigService<TConfig> extends IService {
  get<T>(key: string): T;
  set(key: string, value: unknown): void;
  getConfig(): TConfig;
}

export interface IEventEmitter<TEvents> {
  emit<K extends keyof TEvents & string>(event: K, data: TEvents[K]): void;
  on<K extends keyof TEvents & string>(event: K, handler: (data: TEvents[K]) => void): void;
  off<K extends keyof TEvents & string>(event: K, handler: (data: TEvents[K]) => void): void;
}
