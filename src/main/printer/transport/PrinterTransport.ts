/**
 * Base Printer Transport Interface and Abstract Class
 *
 * Connection state machine and event emission shared by transports.
 * Failures surface to the caller as they happen; a transport never
 * retries or reconnects on its own.
 *
 * @module printer/transport/PrinterTransport
 */

import { EventEmitter } from 'events';
import { TransportStatus } from '../types';
import { TIMING } from '../../../shared/constants';
import { debugLogger } from '../../../shared/utils/debug-logger';
import { PrinterErrorCode, getErrorMessage } from '../../../shared/utils/error-handler';

/**
 * Transport connection states
 */
export enum TransportState {
  DISCONNECTED = 'disconnected',
  CONNECTING = 'connecting',
  CONNECTED = 'connected',
  ERROR = 'error',
}

/**
 * Transport event types
 */
export enum TransportEvent {
  CONNECTED = 'connected',
  DISCONNECTED = 'disconnected',
  ERROR = 'error',
  STATE_CHANGE = 'stateChange',
}

/**
 * Transport error with additional context
 */
export interface TransportError {
  code: PrinterErrorCode;
  message: string;
  originalError?: Error;
}

export interface StateChange {
  oldState: TransportState;
  newState: TransportState;
}

/**
 * Options for transport connection
 */
export interface TransportOptions {
  /** Connection timeout in milliseconds (default: 5000) */
  connectionTimeout?: number;
}

export const DEFAULT_TRANSPORT_OPTIONS: Required<TransportOptions> = {
  connectionTimeout: TIMING.CONNECTION_TIMEOUT_MS,
};

/**
 * Interface for printer transport implementations
 */
export interface IPrinterTransport {
  /** Resolves false when the target device is not present */
  connect(): Promise<boolean>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  /** Resolves with the number of bytes the device accepted */
  send(data: Buffer): Promise<number>;
  getStatus(): TransportStatus;
  getState(): TransportState;
  onDisconnect(callback: () => void): void;
  onError(callback: (error: TransportError) => void): void;
  onStateChange(callback: (change: StateChange) => void): void;
}

/**
 * Abstract base class for printer transports
 */
export abstract class BasePrinterTransport extends EventEmitter implements IPrinterTransport {
  protected state: TransportState = TransportState.DISCONNECTED;
  protected options: Required<TransportOptions>;
  protected lastConnected?: Date;
  protected lastError?: string;

  constructor(options?: TransportOptions) {
    super();
    this.options = { ...DEFAULT_TRANSPORT_OPTIONS, ...options };
  }

  /**
   * Establish the connection; resolve false when the device is absent
   */
  protected abstract doConnect(): Promise<boolean>;

  protected abstract doDisconnect(): Promise<void>;

  protected abstract doSend(data: Buffer): Promise<number>;

  /**
   * Connect once, bounded by the connection timeout
   */
  async connect(): Promise<boolean> {
    if (this.state === TransportState.CONNECTED) {
      return true;
    }

    this.setState(TransportState.CONNECTING);

    let timer: NodeJS.Timeout | undefined;
    let timedOut = false;
    const attempt = this.doConnect();
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        reject(new Error(`Connection timeout after ${this.options.connectionTimeout}ms`));
      }, this.options.connectionTimeout);
    });

    try {
      const found = await Promise.race([attempt, timeout]);
      if (!found) {
        this.setState(TransportState.DISCONNECTED);
        return false;
      }

      this.setState(TransportState.CONNECTED);
      this.lastConnected = new Date();
      this.lastError = undefined;
      this.emit(TransportEvent.CONNECTED);
      return true;
    } catch (error) {
      if (timedOut) {
        this.releaseLateConnection(attempt);
      }
      this.setState(TransportState.ERROR);
      this.reportError(`Connection failed: ${getErrorMessage(error)}`, error);
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  async disconnect(): Promise<void> {
    if (this.state === TransportState.DISCONNECTED) {
      return;
    }

    try {
      await this.doDisconnect();
    } finally {
      this.setState(TransportState.DISCONNECTED);
      this.emit(TransportEvent.DISCONNECTED);
    }
  }

  isConnected(): boolean {
    return this.state === TransportState.CONNECTED;
  }

  async send(data: Buffer): Promise<number> {
    if (!this.isConnected()) {
      throw new Error('Transport is not connected');
    }

    try {
      return await this.doSend(data);
    } catch (error) {
      this.reportError(`Send failed: ${getErrorMessage(error)}`, error);
      throw error;
    }
  }

  getStatus(): TransportStatus {
    return {
      connected: this.isConnected(),
      lastConnected: this.lastConnected,
      lastError: this.lastError,
    };
  }

  getState(): TransportState {
    return this.state;
  }

  onDisconnect(callback: () => void): void {
    this.on(TransportEvent.DISCONNECTED, callback);
  }

  onError(callback: (error: TransportError) => void): void {
    this.on(TransportEvent.ERROR, callback);
  }

  onStateChange(callback: (change: StateChange) => void): void {
    this.on(TransportEvent.STATE_CHANGE, callback);
  }

  /**
   * Close whatever a timed-out connect attempt opens once it settles
   */
  private releaseLateConnection(attempt: Promise<boolean>): void {
    attempt
      .then((found) => (found ? this.doDisconnect() : undefined))
      .catch((error: unknown) => {
        debugLogger.warn('Releasing late connection failed', error, 'PrinterTransport');
      });
  }

  /**
   * Record the failure and notify error listeners, if any.
   * An unhandled 'error' event would throw from emit.
   */
  protected reportError(message: string, cause: unknown): void {
    this.lastError = message;
    if (this.listenerCount(TransportEvent.ERROR) === 0) {
      return;
    }
    const transportError: TransportError = {
      code: PrinterErrorCode.CONNECTION_FAILED,
      message,
      originalError: cause instanceof Error ? cause : undefined,
    };
    this.emit(TransportEvent.ERROR, transportError);
  }

  protected setState(newState: TransportState): void {
    const oldState = this.state;
    this.state = newState;
    if (oldState !== newState) {
      const change: StateChange = { oldState, newState };
      this.emit(TransportEvent.STATE_CHANGE, change);
    }
  }

  /**
   * Clean up resources
   */
  destroy(): void {
    this.removeAllListeners();
  }
}
