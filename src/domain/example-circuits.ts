import type { CircuitDocument } from '../ir/types';

const Q = { kind: 'qubit', width: 1 } as const;
const BIT = { kind: 'cbit', width: 1 } as const;
const ANGLE = { kind: 'angle', width: 64 } as const;

/**
 * Entangles two qubits and measures the second one.
 */
export const BELL_CIRCUIT: CircuitDocument = {
  version: '1.0.0',
  meta: { name: 'Bell Pair', description: 'U on q0, CX(q0, q1), measure q1.' },
  entryPoint: 'main',
  functions: [
    {
      id: 'main',
      inputs: [],
      outputs: [],
      body: [
        { op: 'qcs.init' },
        { op: 'qcs.shot_init' },
        { op: 'quir.declare_qubit', results: [{ id: 'q0', type: Q }], attrs: { id: 0 } },
        { op: 'quir.declare_qubit', results: [{ id: 'q1', type: Q }], attrs: { id: 1 } },
        { op: 'quir.constant', results: [{ id: 'theta', type: ANGLE }], attrs: { value: { kind: 'angle', value: 1.5707963267948966, width: 64 } } },
        { op: 'quir.constant', results: [{ id: 'phi', type: ANGLE }], attrs: { value: { kind: 'angle', value: 0, width: 64 } } },
        { op: 'quir.constant', results: [{ id: 'lambda', type: ANGLE }], attrs: { value: { kind: 'angle', value: 3.141592653589793, width: 64 } } },
        { op: 'quir.builtin_U', operands: ['q0', 'theta', 'phi', 'lambda'], comment: 'Hadamard up to phase' },
        { op: 'quir.builtin_CX', operands: ['q0', 'q1'] },
        { op: 'quir.measure', operands: ['q1'], results: [{ id: 'c1', type: BIT }] },
        { op: 'qcs.finalize' },
        { op: 'func.return' },
      ],
    },
  ],
};

/**
 * Uses the parts of the circuit layer the simulator drops (gate definitions,
 * timing, barriers) and returns its measurement from the entry function.
 */
export const TIMED_CIRCUIT: CircuitDocument = {
  version: '1.0.0',
  meta: { name: 'Timed X', description: 'Custom gate call, delay and barrier around a measured qubit.' },
  entryPoint: 'main',
  functions: [
    {
      id: 'x_gate',
      inputs: [{ id: 'q', type: Q }],
      outputs: [],
      comment: 'Gate definitions are inlined before lowering.',
      body: [
        { op: 'quir.constant', results: [{ id: 'pi', type: ANGLE }], attrs: { value: { kind: 'angle', value: 3.141592653589793, width: 64 } } },
        { op: 'quir.constant', results: [{ id: 'zero', type: ANGLE }], attrs: { value: { kind: 'angle', value: 0, width: 64 } } },
        { op: 'quir.builtin_U', operands: ['q', 'pi', 'zero', 'pi'] },
        { op: 'func.return' },
      ],
    },
    {
      id: 'main',
      inputs: [],
      outputs: [BIT],
      body: [
        { op: 'qcs.init' },
        { op: 'quir.declare_qubit', results: [{ id: 'q0', type: Q }], attrs: { id: 0 } },
        { op: 'quir.call_gate', operands: ['q0'], attrs: { callee: 'x_gate' } },
        { op: 'quir.constant', results: [{ id: 'wait', type: { kind: 'duration' } }], attrs: { value: { kind: 'duration', value: 100, unit: 'ns' } } },
        { op: 'quir.delay', operands: ['wait', 'q0'] },
        { op: 'quir.barrier', operands: ['q0'] },
        { op: 'qcs.synchronize', operands: ['q0'] },
        { op: 'quir.measure', operands: ['q0'], results: [{ id: 'c0', type: BIT }] },
        { op: 'qcs.finalize' },
        { op: 'func.return', operands: ['c0'] },
      ],
    },
  ],
};
