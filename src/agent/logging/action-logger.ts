import { EventEmitter } from 'eventemitter3';

export const EMPTY_TURN_LOG = 'No API interactions recorded this turn.';

export interface ActionLoggerEvents {
  line: (line: string) => void;
}

/**
 * Turn-scoped record of tool interactions.
 *
 * Every line feeds the planner's view of the current turn; `log` lines are
 * also echoed to the live stream and emitted so an executor run can capture
 * them as part of its output.
 */
export class ActionLogger extends EventEmitter<ActionLoggerEvents> {
  private buffer: string[] = [];

  constructor(private readonly echo?: (line: string) => void) {
    super();
  }

  log(line: string): void {
    this.buffer.push(line);
    this.echo?.(line);
    this.emit('line', line);
  }

  /**
   * Record without echo: the caller has already surfaced the raw text.
   */
  logError(line: string): void {
    this.buffer.push(line);
  }

  getHistoryEntry(): string {
    if (this.buffer.length === 0) {
      return EMPTY_TURN_LOG;
    }
    return this.buffer.join('\n');
  }

  lines(): readonly string[] {
    return [...this.buffer];
  }

  clear(): void {
    this.buffer = [];
  }
}
