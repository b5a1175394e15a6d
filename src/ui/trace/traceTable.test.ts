import { describe, it, expect } from 'vitest';
import { renderTapeRow, renderTrace, scannedCell } from './traceTable';
import { unaryHeader } from './unary';
import { recordTrace } from '../../core/trace';
import { machineFromPatterns } from '../../core/notation';

const ADDER = ['oR0,oR2', 'xL3,xR2', 'oR4,xL3', 'oR0,oR0'];

describe('renderTapeRow', () => {
  it('draws cells with box separators', () => {
    expect(renderTapeRow([true, false, true])).toBe('│x│o│x│');
  });

  it('draws ASCII separators', () => {
    expect(renderTapeRow([true, false], { fancy: false })).toBe('|x|o|');
  });

  it('marks the pointer cell', () => {
    expect(renderTapeRow([true, false, true], { pointer: 1 })).toBe('│x├o┤x│');
    expect(renderTapeRow([true, false, true], { pointer: 1, fancy: false })).toBe('|x>o|x|');
  });

  it('ignores a pointer outside the row', () => {
    expect(renderTapeRow([true], { pointer: 3 })).toBe('│x│');
  });
});

describe('scannedCell', () => {
  it('shifts the scanned cell after a left extension', () => {
    const [move] = recordTrace(machineFromPatterns('x', ['oL0,xL0'])).moves;
    expect(move.fromSquare).toBe(0);
    expect(scannedCell(move)).toBe(1);
    expect(renderTapeRow(move.symbols, { pointer: scannedCell(move) })).toBe('│o├x┤');
  });
});

describe('renderTrace', () => {
  const oneStep = recordTrace(machineFromPatterns('o', ['xR0,xR0']));

  it('renders a boxed table', () => {
    expect(renderTrace(oneStep).split('\n')).toEqual([
      '        ┌─┐',
      'Input   │o│',
      '        ├─┤',
      'State 1 ├x┤o│',
      '        ├─┼─┤',
      'Output  │x│o│',
      '        └─┴─┘',
    ]);
  });

  it('renders plain ASCII without borders', () => {
    expect(renderTrace(oneStep, { fancy: false }).split('\n')).toEqual([
      'Input   |o|',
      'State 1 >x|o|',
      'Output  |x|o|',
    ]);
  });

  it('can leave out the pointer', () => {
    const lines = renderTrace(oneStep, { pointer: false }).split('\n');
    expect(lines[3]).toBe('State 1 │x│o│');
  });

  it('labels each move row with the state it ran in', () => {
    const trace = recordTrace(machineFromPatterns('xxoxx', ADDER));
    const lines = renderTrace(trace, { fancy: false }).split('\n');
    expect(lines.map(l => l.slice(0, 8).trimEnd())).toEqual([
      'Input', 'State 1', 'State 2', 'State 2', 'State 3', 'State 3', 'State 4', 'Output',
    ]);
    expect(lines[3]).toBe('State 2 |o|x>x|x|x|');
  });

  it('uses a custom header function for input and output', () => {
    const trace = recordTrace(machineFromPatterns('xxoxx', ADDER));
    const lines = renderTrace(trace, { header: unaryHeader }).split('\n');
    expect(lines).toHaveLength(12);
    expect(lines[0]).toBe('        ┌─┬─┬─┬─┬─┐');
    expect(lines[1]).toBe('1 1     │x│x│o│x│x│');
    expect(lines[10]).toBe('2       │o│o│x│x│x│');
    expect(lines[11]).toBe('        └─┴─┴─┴─┴─┘');
  });

  it('labels the last row Stopped when the run did not halt', () => {
    const trace = recordTrace(machineFromPatterns('ox', ['oR1,xL1']), { maxSteps: 2 });
    expect(renderTrace(trace, { fancy: false }).split('\n')).toEqual([
      'Input   |o|x|',
      'State 1 >o|x|',
      'State 1 |o>x|',
      'Stopped |o|x|',
    ]);
  });

  it('renders a trace with no moves', () => {
    const machine = machineFromPatterns('xx', ['oR0,oR0']);
    machine.runToHalt();
    const trace = recordTrace(machine);
    expect(renderTrace(trace, { fancy: false }).split('\n')).toEqual([
      'Input  |o|x|',
      'Output |o|x|',
    ]);
  });
});
