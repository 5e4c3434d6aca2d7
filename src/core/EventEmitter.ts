import { EventEmitter as NodeEventEmitter } from 'events';
import type { IEventEmitter, ILogger } from '../interfaces/IService';
import { toError } from './errors';

export class EventEmitter<TEvents> implements IEventEmitter<TEvents> {
  private emitter: NodeEventEmitter;
  private logger?: ILogger;

  constructor(logger?: ILogger) {
    this.emitter = new NodeEventEmitter();
    this.logger = logger;

    // Set max listeners to handle multiple subscribers
    this.emitter.setMaxListeners(100);
  }

  emit<K extends keyof TEvents & string>(event: K, data: TEvents[K]): void {
    try {
      this.logger?.debug(`Emitting event: ${event}`);
      this.emitter.emit(event, data);
    } catch (error) {
      this.logger?.error(`Error emitting event: ${event}`, toError(error));
    }
  }

  on<K extends keyof TEvents & string>(event: K, handler: (data: TEvents[K]) => void): void {
    this.logger?.debug(`Registering handler for event: ${event}`);
    this.emitter.on(event, handler);
  }

  off<K extends keyof TEvents & string>(event: K, handler: (data: TEvents[K]) => void): void {
    this.logger?.debug(`Removing handler for event: ${event}`);
    this.emitter.off(event, handler);
  }

  once<K extends keyof TEvents & string>(event: K, handler: (data: TEvents[K]) => void): void {
    this.emitter.once(event, handler);
  }

  removeAllListeners(event?: keyof TEvents & string): void {
    if (event === undefined) {
      this.emitter.removeAllListeners();
    } else {
      this.emitter.removeAllListeners(event);
    }
  }

  listenerCount(event: keyof TEvents & string): number {
    return this.emitter.listenerCount(event);
  }
}
