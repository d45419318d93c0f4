import * as fs from 'fs';
import { z } from 'zod';

// ------------------------------------------------------------------
// Simulator Configuration
// ------------------------------------------------------------------

export const SIMULATION_METHODS = [
  'automatic', 'statevector', 'density_matrix', 'matrix_product_state',
  'stabilizer', 'extended_stabilizer', 'unitary', 'superop'
] as const;
export const DEVICES = ['cpu', 'gpu', 'thrust'] as const;
export const PRECISIONS = ['double', 'single'] as const;

export type SimulationMethod = typeof SIMULATION_METHODS[number];
export type Device = typeof DEVICES[number];
export type Precision = typeof PRECISIONS[number];

export interface SimulatorConfig {
  method: SimulationMethod;
  device: Device;
  precision: Precision;
}

// Tokens the runtime's configure entry point expects.
const METHOD_TOKENS: Record<SimulationMethod, string> = {
  automatic: 'automatic',
  statevector: 'statevector',
  density_matrix: 'density_matrix',
  matrix_product_state: 'matrix_product_state',
  stabilizer: 'stabilizer',
  extended_stabilizer: 'extended_stabilizer',
  unitary: 'unitary',
  superop: 'superop',
};

const DEVICE_TOKENS: Record<Device, string> = {
  cpu: 'CPU',
  gpu: 'GPU',
  thrust: 'Thrust',
};

const PRECISION_TOKENS: Record<Precision, string> = {
  double: 'double',
  single: 'single',
};

const lowercase = (v: unknown) => (typeof v === 'string' ? v.toLowerCase() : v);

export const SimulatorConfigSchema = z.object({
  method: z.preprocess(lowercase, z.enum(SIMULATION_METHODS)).default('automatic'),
  device: z.preprocess(lowercase, z.enum(DEVICES)).default('cpu'),
  precision: z.preprocess(lowercase, z.enum(PRECISIONS)).default('double'),
});

export const DEFAULT_SIMULATOR_CONFIG: SimulatorConfig = {
  method: 'automatic',
  device: 'cpu',
  precision: 'double',
};

/** The (key, value) pairs passed to the runtime, in configuration order. */
export function configurationEntries(config: SimulatorConfig): [string, string][] {
  return [
    ['method', METHOD_TOKENS[config.method]],
    ['device', DEVICE_TOKENS[config.device]],
    ['precision', PRECISION_TOKENS[config.precision]],
  ];
}

export function parseSimulatorConfig(json: unknown): SimulatorConfig {
  const result = SimulatorConfigSchema.safeParse(json ?? {});
  if (!result.success) {
    const details = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new Error(`Invalid simulator configuration: ${details}`);
  }
  return result.data;
}

export function loadSimulatorConfig(file: string): SimulatorConfig {
  const raw = fs.readFileSync(file, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Simulator configuration '${file}' is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseSimulatorConfig(json);
}
