import { EventEmitter } from 'events';

export interface ChallengeDetectedData {
  url: string;
  reason: string;
  queryContext: string;
  sequenceNumber: number;
}

export interface ChallengeResolvedData {
  url: string;
  ok: boolean;
  backend: string;
  reason: string;
}

export interface ProxyRotatedData {
  scopeKey: string;
  sessionId: string;
  rotationCount: number;
  reason: string;
}

export interface CheckpointWrittenData {
  path: string;
  totalCollected: number;
}

export interface LogMessageData {
  message: string;
  level: string;
  timestamp: Date;
}

export class ResilienceEventBus extends EventEmitter {
  public readonly events = {
    CHALLENGE_DETECTED: 'challenge:detected',
    CHALLENGE_RESOLVED: 'challenge:resolved',
    PROXY_ROTATED: 'proxy:rotated',
    CHECKPOINT_WRITTEN: 'checkpoint:written',
    LOG_MESSAGE: 'log:message',
  } as const;

  emitChallengeDetected(data: ChallengeDetectedData): void {
    this.emit(this.events.CHALLENGE_DETECTED, data);
  }

  emitChallengeResolved(data: ChallengeResolvedData): void {
    this.emit(this.events.CHALLENGE_RESOLVED, data);
  }

  emitProxyRotated(data: ProxyRotatedData): void {
    this.emit(this.events.PROXY_ROTATED, data);
  }

  emitCheckpointWritten(data: CheckpointWrittenData): void {
    this.emit(this.events.CHECKPOINT_WRITTEN, data);
  }

  emitLog(message: string, level: string = 'info'): void {
    const data: LogMessageData = { message, level, timestamp: new Date() };
    this.emit(this.events.LOG_MESSAGE, data);
  }
}

export function createEventBus(): ResilienceEventBus {
  return new ResilienceEventBus();
}
