import { promises as fs } from "fs";
import { dirname, resolve } from "path";
import { shellConfig } from "../config/simulation";
import type { WorldSnapshot } from "../models/simulation";
import { SimulationRuntime } from "../services/simulationRuntime";
import { sleep } from "../utils/timing";

interface CliOptions {
  seconds: number;
  seed: number;
  reportEverySeconds: number;
  output?: string;
}

const DEFAULTS: CliOptions = {
  seconds: 30,
  seed: shellConfig.scenarioSeed,
  reportEverySeconds: 1,
};

const parseArgs = (): CliOptions => {
  const args = process.argv.slice(2);
  const options: CliOptions = { ...DEFAULTS };
  const requireValue = (flag: string, value: string | undefined) => {
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for --${flag}`);
    }
    return value;
  };
  const requirePositive = (flag: string, value: string | undefined) => {
    const parsed = Number.parseFloat(requireValue(flag, value));
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new Error(`--${flag} must be a positive number`);
    }
    return parsed;
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === undefined || !arg.startsWith("--")) {
      continue;
    }
    const key = arg.slice(2);
    switch (key) {
      case "seconds":
        options.seconds = requirePositive(key, args[i + 1]);
        i += 1;
        break;
      case "seed":
        options.seed = Number.parseInt(requireValue(key, args[i + 1]), 10);
        i += 1;
        break;
      case "report":
        options.reportEverySeconds = requirePositive(key, args[i + 1]);
        i += 1;
        break;
      case "output":
        options.output = requireValue(key, args[i + 1]);
        i += 1;
        break;
      default:
        break;
    }
  }

  if (!Number.isInteger(options.seed)) {
    throw new Error("--seed must be an integer");
  }

  return options;
};

const describeSnapshot = (clock: string, snapshot: WorldSnapshot) => {
  const lights = snapshot.intersections.map((intersection) => `#${intersection.id}@${intersection.x}=${intersection.color}`);
  const cars = snapshot.cars.map((car) => `car${car.id}@${car.x.toFixed(1)}→${car.targetIndex}`);
  return `${clock} | ${lights.join(" ")} | ${cars.join(" ")}`;
};

const writeSnapshots = async (outputPath: string, lines: string[]) => {
  const resolved = resolve(outputPath);
  await fs.mkdir(dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, `${lines.join("\n")}\n`, "utf8");
};

const main = async () => {
  const options = parseArgs();
  const runtime = new SimulationRuntime();
  const recorded: string[] = [];

  runtime.loadDemoScenario(options.seed);
  runtime.clock.start();
  runtime.startLights();
  runtime.simulation.start();

  const reports = Math.max(1, Math.floor(options.seconds / options.reportEverySeconds));
  try {
    for (let report = 0; report < reports; report += 1) {
      await sleep(options.reportEverySeconds * 1000);
      const snapshot = runtime.simulation.snapshot();
      recorded.push(JSON.stringify(snapshot));
      // eslint-disable-next-line no-console
      console.log(describeSnapshot(runtime.clock.getCurrentTime(), snapshot));
    }
  } finally {
    await runtime.shutdown();
  }

  if (options.output) {
    await writeSnapshots(options.output, recorded);
    // eslint-disable-next-line no-console
    console.log(`Wrote ${recorded.length} snapshots to ${resolve(options.output)}`);
  }
};

if (require.main === module) {
  void main().catch((error) => {
    // eslint-disable-next-line no-console
    console.error("Demo run failed", error);
    process.exitCode = 1;
  });
}
