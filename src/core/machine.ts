/**
 * Single-tape binary Turing machine.
 *
 * One step is scan → stamp → move → transition, performed only while the
 * machine is running. Stepping a halted machine returns null.
 */
import { Tape } from './tape';
import { Program } from './program';
import { HALT_STATE, INITIAL_STATE, TIMEOUT_CHECK_INTERVAL } from './constants';
import { InvalidArgumentError, TapeRangeError } from './errors';
import { Direction, RunOutcome } from './types';
import type {
  MachineSnapshot, MachineStatus, Move, RunOptions, RunResult, TapeExtension,
} from './types';

const HALTED: MachineStatus = Object.freeze({ kind: 'halted' });

function statusFor(index: number): MachineStatus {
  return index === HALT_STATE ? HALTED : Object.freeze({ kind: 'running', state: index });
}

export class Machine {
  readonly program: Program;
  private tape: Tape;
  private head = 0;
  private status: MachineStatus = statusFor(INITIAL_STATE);
  private stepCount = 0;

  constructor(tape: Tape = new Tape(), program: Program = new Program()) {
    this.tape = tape;
    this.program = program;
  }

  get position(): number {
    return this.head;
  }

  /** Current state index; 0 once halted. */
  get state(): number {
    return this.status.kind === 'running' ? this.status.state : HALT_STATE;
  }

  get steps(): number {
    return this.stepCount;
  }

  getStatus(): MachineStatus {
    return this.status;
  }

  isHalted(): boolean {
    return this.status.kind === 'halted';
  }

  getTape(): Tape {
    return this.tape;
  }

  /** Install a different tape. The head keeps its position. */
  loadTape(tape: Tape): void {
    if (this.head >= tape.length) {
      throw new TapeRangeError(this.head, tape.length);
    }
    this.tape = tape;
  }

  step(): Move | null {
    if (this.status.kind === 'halted') return null;

    // Scan
    const fromState = this.status.state;
    const fromSquare = this.head;
    const behavior = this.program.lookup(fromState, this.tape.read(fromSquare));

    // Stamp (always, even if the symbol is unchanged)
    this.tape.write(fromSquare, behavior.write);

    // Move
    const extended = this.moveHead(behavior.direction);

    // Transition
    this.status = statusFor(behavior.next);
    this.stepCount++;

    return Object.freeze({
      symbols: Object.freeze(this.tape.toArray()),
      fromSquare,
      toSquare: this.head,
      fromState,
      toState: behavior.next,
      extended,
    });
  }

  /** Lazily step until halted. */
  *moves(): Generator<Move, void, void> {
    for (let move = this.step(); move !== null; move = this.step()) {
      yield move;
    }
  }

  /**
   * Step until the machine halts or a bound is reached. With no bounds a
   * non-halting program never returns.
   */
  runToHalt(options: RunOptions = {}): RunResult {
    const { maxSteps = Infinity, timeoutMs, onStep } = options;
    if (maxSteps !== Infinity && (!Number.isInteger(maxSteps) || maxSteps < 0)) {
      throw new InvalidArgumentError('maxSteps', maxSteps, 'a non-negative integer');
    }
    if (timeoutMs !== undefined && !(timeoutMs >= 0)) {
      throw new InvalidArgumentError('timeoutMs', timeoutMs, 'a non-negative number');
    }
    const moves: Move[] = [];
    const start = performance.now();

    for (;;) {
      if (this.status.kind === 'halted') {
        return { outcome: RunOutcome.HALTED, moves, steps: moves.length };
      }
      if (moves.length >= maxSteps) {
        return { outcome: RunOutcome.STEP_LIMIT, moves, steps: moves.length };
      }
      if (timeoutMs !== undefined
        && moves.length % TIMEOUT_CHECK_INTERVAL === 0
        && performance.now() - start >= timeoutMs) {
        return { outcome: RunOutcome.TIMEOUT, moves, steps: moves.length };
      }
      const move = this.step();
      if (move === null) continue;
      moves.push(move);
      onStep?.(move);
    }
  }

  /** Back to head 0, state 1. The tape is left as it is. */
  rewind(): void {
    this.head = 0;
    this.status = statusFor(INITIAL_STATE);
    this.stepCount = 0;
  }

  getSnapshot(): MachineSnapshot {
    return {
      symbols: this.tape.toArray(),
      head: this.head,
      state: this.state,
      halted: this.isHalted(),
      steps: this.stepCount,
    };
  }

  private moveHead(direction: Direction): TapeExtension {
    if (direction === Direction.LEFT) {
      if (this.head === 0) {
        // Head stays at 0, which is now the new blank cell
        this.tape.extendLeft();
        return 'left';
      }
      this.head--;
      return null;
    }
    if (this.head === this.tape.length - 1) {
      this.tape.extendRight();
      this.head++;
      return 'right';
    }
    this.head++;
    return null;
  }
}
