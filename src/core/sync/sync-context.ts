/**
 * 동기화 실행 컨텍스트
 * 실행마다 새로 만들어 각 컴포넌트에 전달합니다 (전역 상태 없음).
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from '../../utils/logger';
import type { SyncState, SyncStatus, WorkerStatus } from './types';

// 컨텍스트 이벤트
export interface SyncContextEvents {
  state: (state: SyncState, previous: SyncState) => void;
  worker: (worker: string, status: WorkerStatus) => void;
}

export class SyncContext extends EventEmitter<SyncContextEvents> {
  readonly logger: Logger;
  private currentState: SyncState = 'init';
  private workers = new Map<string, WorkerStatus>();

  constructor(logger: Logger) {
    super();
    this.logger = logger;
  }

  get state(): SyncState {
    return this.currentState;
  }

  /**
   * 상태 전이
   */
  setState(state: SyncState): void {
    const previous = this.currentState;
    this.currentState = state;
    this.logger.debug('동기화 상태 변경', { from: previous, to: state });
    this.emit('state', state, previous);
  }

  /**
   * 워커 상태 기록
   */
  setWorkerStatus(worker: string, status: string): void {
    const entry: WorkerStatus = { status, ts: new Date() };
    this.workers.set(worker, entry);
    this.logger.debug(`[${worker}] ${status}`);
    this.emit('worker', worker, entry);
  }

  /**
   * 현재 상태 복사본
   */
  status(): SyncStatus {
    const workers: Record<string, WorkerStatus> = {};
    for (const [name, entry] of this.workers) {
      workers[name] = { ...entry };
    }
    return { state: this.currentState, workers };
  }
}
