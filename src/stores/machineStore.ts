/**
 * Zustand store for interactive stepping through a machine run.
 * Holds the machine, the input it started from and the moves so far.
 * Stepping back replays the run from the input, one step shorter.
 */
import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import { Machine } from '../core/machine';
import { Program } from '../core/program';
import { Tape } from '../core/tape';
import type { Move, RunOptions, RunOutcome, TapeSymbol } from '../core/types';

export interface MachineSessionState {
  machine: Machine | null;
  program: Program | null;
  input: TapeSymbol[];

  // Mirrors of the machine, refreshed after every action
  tape: TapeSymbol[];
  head: number;
  state: number;
  halted: boolean;
  moves: Move[];

  outcome: RunOutcome | null;
  error: string | null;

  // Actions
  /** Start a fresh session on `input`. */
  load: (program: Program, input: readonly TapeSymbol[]) => void;

  /** Advance one step. No-op once halted. */
  step: () => void;

  /** Undo the last step by replaying from the input. */
  stepBack: () => void;

  /** Step until halted or a bound is hit. */
  run: (options?: RunOptions) => void;

  /** Fresh tape from the input, machine rewound. */
  reset: () => void;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createMachineStore(): StoreApi<MachineSessionState> {
  return createStore<MachineSessionState>((set, get) => {
    const mirror = (machine: Machine, moves: Move[]) => ({
      tape: machine.getTape().toArray(),
      head: machine.position,
      state: machine.state,
      halted: machine.isHalted(),
      moves,
    });

    const start = (program: Program, input: TapeSymbol[]) => {
      const machine = new Machine(Tape.fromSymbols(input), program);
      set({ machine, program, input, outcome: null, error: null, ...mirror(machine, []) });
    };

    return {
      machine: null,
      program: null,
      input: [],
      tape: [],
      head: 0,
      state: 0,
      halted: false,
      moves: [],
      outcome: null,
      error: null,

      load: (program, input) => {
        start(program, [...input]);
      },

      step: () => {
        const { machine, moves } = get();
        if (!machine) return;
        try {
          const move = machine.step();
          const next = move ? [...moves, move] : moves;
          set({ error: null, ...mirror(machine, next) });
        } catch (err) {
          set({ error: errorMessage(err), ...mirror(machine, moves) });
        }
      },

      stepBack: () => {
        const { program, input, moves } = get();
        if (!program || moves.length === 0) return;

        const machine = new Machine(Tape.fromSymbols(input), program);
        const replayed: Move[] = [];
        for (let i = 0; i < moves.length - 1; i++) {
          const move = machine.step();
          if (move) replayed.push(move);
        }
        set({ machine, outcome: null, error: null, ...mirror(machine, replayed) });
      },

      run: (options) => {
        const { machine, moves } = get();
        if (!machine) return;
        const collected = [...moves];
        try {
          const { outcome } = machine.runToHalt({
            ...options,
            onStep: move => {
              collected.push(move);
              options?.onStep?.(move);
            },
          });
          set({ outcome, error: null, ...mirror(machine, collected) });
        } catch (err) {
          set({ error: errorMessage(err), ...mirror(machine, collected) });
        }
      },

      reset: () => {
        const { machine, input } = get();
        if (!machine) return;
        machine.rewind();
        machine.loadTape(Tape.fromSymbols(input));
        set({ outcome: null, error: null, ...mirror(machine, []) });
      },
    };
  });
}
