import { EventEmitter } from 'events';

export interface Disposable {
  dispose(): void;
}

/**
 * An event subscription function compatible with NodeJS.EventEmitter.
 */
export interface Event<T> {
  (listener: (e: T) => void): Disposable;
}

export class Emitter<T> {
  private eventEmitter = new EventEmitter();
  private _event?: Event<T>;

  get event(): Event<T> {
    if (!this._event) {
      this._event = (listener: (e: T) => void) => {
        this.eventEmitter.on('event', listener);
        return {
          dispose: () => this.eventEmitter.removeListener('event', listener),
        };
      };
    }
    return this._event;
  }

  fire(data: T): void {
    this.eventEmitter.emit('event', data);
  }

  dispose(): void {
    this.eventEmitter.removeAllListeners();
  }
}
