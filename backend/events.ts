import { EventEmitter } from 'events';
import type {
  FailureCategory,
  SessionFailure,
  TerminalStatus,
  VerifyResult,
} from './models.js';
import type { SessionPhase } from './session-machine.js';

export interface LemmaLoopEvent {
  type: string;
  timestamp: number;
}

export interface BatchStartedEvent extends LemmaLoopEvent {
  type: 'batch_started';
  totalProblems: number;
  concurrency: number;
}

export interface SessionStartedEvent extends LemmaLoopEvent {
  type: 'session_started';
  problemId: string;
  maxIterations: number;
}

export interface PhaseChangeEvent extends LemmaLoopEvent {
  type: 'phase_change';
  problemId: string;
  phase: SessionPhase;
  attempt: number;
}

export interface AttemptGeneratedEvent extends LemmaLoopEvent {
  type: 'attempt_generated';
  problemId: string;
  attempt: number;
  proofLength: number;
}

export interface VerificationCompleteEvent extends LemmaLoopEvent {
  type: 'verification_complete';
  problemId: string;
  attempt: number;
  outcome: VerifyResult['outcome'];
  diagnostic?: string;
}

export interface JudgeCompleteEvent extends LemmaLoopEvent {
  type: 'judge_complete';
  problemId: string;
  attempt: number;
  outcome: 'accept' | 'reject';
  reason?: string;
}

export interface AttemptFailedEvent extends LemmaLoopEvent {
  type: 'attempt_failed';
  problemId: string;
  attempt: number;
  category: FailureCategory;
}

export interface SessionCompleteEvent extends LemmaLoopEvent {
  type: 'session_complete';
  problemId: string;
  status: TerminalStatus;
  attemptCount: number;
  failure?: SessionFailure;
}

export interface BatchCompleteEvent extends LemmaLoopEvent {
  type: 'batch_complete';
  totals: Record<TerminalStatus, number>;
  totalTime: number;
}

export interface LogEvent extends LemmaLoopEvent {
  type: 'log';
  level: 'info' | 'warn' | 'error' | 'success';
  message: string;
  problemId?: string;
}

export interface ErrorEvent extends LemmaLoopEvent {
  type: 'error';
  error: string;
  problemId?: string;
}

export type ProofEvent =
  | BatchStartedEvent
  | SessionStartedEvent
  | PhaseChangeEvent
  | AttemptGeneratedEvent
  | VerificationCompleteEvent
  | JudgeCompleteEvent
  | AttemptFailedEvent
  | SessionCompleteEvent
  | BatchCompleteEvent
  | LogEvent
  | ErrorEvent;

export class ProofEventEmitter extends EventEmitter {
  emit(event: 'event', data: ProofEvent): boolean {
    return super.emit(event, data);
  }

  on(event: 'event', listener: (data: ProofEvent) => void): this {
    return super.on(event, listener);
  }
}
