import * as path from 'path';
import { DEFAULT_SIMULATOR_CONFIG, loadSimulatorConfig } from '../src/compiler/simulator/config';
import { lowerToSimulator } from '../src/compiler/simulator/lower-to-simulator';
import { printModule } from '../src/ir/printer';
import { loadCircuit } from '../src/ir/schema';

// Usage: tsx scripts/lower-circuit.ts <circuit.json> [config.json]
const [circuitFile, configFile] = process.argv.slice(2);
if (!circuitFile) {
  console.error('Usage: lower-circuit <circuit.json> [config.json]');
  process.exit(2);
}

const orExit = <T>(load: () => T): T => {
  try {
    return load();
  } catch (e) {
    console.error(`[Lowering] ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
  }
};

const parsed = orExit(() => loadCircuit(path.resolve(circuitFile)));
if (!parsed.success) {
  console.error(`[Lowering] ${circuitFile} is not a valid circuit:`);
  parsed.errors.forEach(e => console.error(`  ${e.path.join('.') || '(root)'}: ${e.message} [${e.code}]`));
  process.exit(1);
}

const config = configFile ? orExit(() => loadSimulatorConfig(path.resolve(configFile))) : DEFAULT_SIMULATOR_CONFIG;
const result = lowerToSimulator(parsed.module, { config });

if (!result.success) {
  console.error(`[Lowering] Failed to lower ${parsed.doc.meta.name}:`);
  result.errors.forEach(e => console.error(`  ${e.opName ? `${e.opName}: ` : ''}${e.message}`));
  process.exit(1);
}

console.log(printModule(result.module));
console.error(`[Lowering] ${result.stats.rewrites} rewrites in ${result.stats.iterations} sweeps`);
