import { DIRECTION_OFFSETS, OPPOSITE } from './constants';
import { type Cell, type Direction } from './types';
import { mod, sameCell } from '../../utils/helpers';

export class Snake {
  private segments: Cell[];
  // Direction the next move will take
  private direction: Direction;
  // Direction of the last completed move; turns are checked against this one
  private heading: Direction;
  private growPending = 0;

  constructor(segments: readonly Cell[], direction: Direction = 'right') {
    if (segments.length === 0) {
      throw new Error('Snake needs at least one segment');
    }
    this.segments = segments.map((cell) => ({ ...cell }));
    this.direction = direction;
    this.heading = direction;
  }

  get head(): Readonly<Cell> {
    return this.segments[0];
  }

  get body(): readonly Readonly<Cell>[] {
    return this.segments;
  }

  get length(): number {
    return this.segments.length;
  }

  get currentDirection(): Direction {
    return this.direction;
  }

  get pendingGrowth(): number {
    return this.growPending;
  }

  move(): void {
    const offset = DIRECTION_OFFSETS[this.direction];
    const newHead = { x: this.head.x + offset.x, y: this.head.y + offset.y };
    this.segments.unshift(newHead);
    this.heading = this.direction;

    if (this.growPending > 0) {
      this.growPending -= 1;
    } else {
      this.segments.pop();
    }
  }

  grow(): void {
    this.growPending += 1;
  }

  /**
   * Requests a turn for the next move. A turn straight back along the last
   * heading is ignored; between two moves the last accepted request wins.
   *
   * The check is made against the direction of the last completed move, not
   * against the previous request, so right, up, down before one move ends up
   * going down where a check against the pending request would keep up.
   */
  changeDirection(newDirection: Direction): void {
    if (OPPOSITE[this.heading] === newDirection) {
      return;
    }
    this.direction = newDirection;
  }

  selfCollision(): boolean {
    const head = this.head;
    return this.segments.slice(1).some((segment) => sameCell(segment, head));
  }

  occupies(cell: Readonly<Cell>): boolean {
    return this.segments.some((segment) => sameCell(segment, cell));
  }

  isHeadInside(cols: number, rows: number): boolean {
    const { x, y } = this.head;
    return x >= 0 && x < cols && y >= 0 && y < rows;
  }

  wrap(cols: number, rows: number): void {
    this.segments[0] = { x: mod(this.head.x, cols), y: mod(this.head.y, rows) };
  }
}
