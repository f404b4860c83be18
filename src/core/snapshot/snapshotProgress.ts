import { EventEmitter } from 'eventemitter3';

// 이벤트 타입
export interface SnapshotProgressEvents {
  start: (total: number) => void;
  message: (message: string) => void;
  increment: (completed: number, total: number) => void;
  finish: (message: string) => void;
}

/**
 * 스냅샷 진행률
 *
 * 패키지 조회 작업들이 동시에 inc()를 호출하지만 Node는 단일 스레드에서
 * 콜백을 실행하므로 카운터 증가는 서로 겹치지 않는다.
 * 렌더링(cli-progress 등)은 이벤트를 구독하는 쪽에서 담당한다.
 */
export class SnapshotProgress extends EventEmitter<SnapshotProgressEvents> {
  private total = 0;
  private completed = 0;
  private message = '';

  setLength(total: number): void {
    this.total = total;
    this.completed = 0;
    this.emit('start', total);
  }

  /**
   * 현재 처리 중인 항목 표시
   */
  setMessage(message: string): void {
    this.message = message;
    this.emit('message', message);
  }

  inc(delta = 1): void {
    this.completed += delta;
    this.emit('increment', this.completed, this.total);
  }

  finish(message: string): void {
    this.message = message;
    this.emit('finish', message);
  }

  getCompleted(): number {
    return this.completed;
  }

  getTotal(): number {
    return this.total;
  }

  getMessage(): string {
    return this.message;
  }
}
