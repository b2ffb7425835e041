export type DomainEvent =
  | { kind: "PieceMoved" }
  | { kind: "PieceRotated" }
  | { kind: "PieceLocked" }
  | { kind: "LinesCleared"; count: number }
  | { kind: "LevelUp"; level: number }
  | { kind: "Paused" }
  | { kind: "Unpaused" }
  | { kind: "GameRestarted" }
  | { kind: "GameOver" };

export type DomainEventKind = DomainEvent["kind"];

/**
 * Accumulate-then-drain buffer between the engine and whoever presents it.
 * One producer (the engine) and one consumer (the driving loop) call it in
 * turn, so a drain always sees every event pushed since the previous drain.
 */
export class EventLog {
  private events: Array<DomainEvent> = [];

  get size(): number {
    return this.events.length;
  }

  push(event: DomainEvent): void {
    this.events.push(event);
  }

  /** Current position, for use with discardSince */
  mark(): number {
    return this.events.length;
  }

  /** Drop events of one kind that were pushed after `mark` */
  discardSince(mark: number, kind: DomainEventKind): void {
    const kept = this.events.slice(0, mark);
    for (const event of this.events.slice(mark)) {
      if (event.kind !== kind) kept.push(event);
    }
    this.events = kept;
  }

  clear(): void {
    this.events = [];
  }

  /** Hand over everything accumulated and start empty */
  drain(): Array<DomainEvent> {
    const drained = this.events;
    this.events = [];
    return drained;
  }
}
