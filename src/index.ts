export * from './core';
export { createMachineStore } from './stores/machineStore';
export type { MachineSessionState } from './stores/machineStore';
export { renderTapeRow, renderTrace, scannedCell } from './ui/trace/traceTable';
export type { HeaderFn, TraceTableOptions, TapeRowOptions } from './ui/trace/traceTable';
export { decodeUnary, encodeUnary, unaryHeader } from './ui/trace/unary';
