#!/usr/bin/env node
/**
 * verity CLI — the main entry point.
 *
 * Commands: classify, init, cost, mutate, noise
 */
import { classifyCmd } from "./commands/classify.js";
import { initCmd } from "./commands/init.js";
import { costCmd } from "./commands/cost.js";
import { mutateCmd } from "./commands/mutate.js";
import { noiseCmd } from "./commands/noise.js";

const USAGE = `
verity — real/fake image classification with a feedforward network

Commands:
  classify         Classify the test image named in the config file
  init             Create a randomly initialised classifier network
  cost             Mean cost of a network over a labelled image directory
  mutate           Write a randomly perturbed copy of a network
  noise            Add noise to an image through the input codec

Options:
  --logLevel=...   debug | info | warn | error | none (default info)
  --seed=N         Seed every random draw
  --help, -h       Show this help

Examples:
  verity init --out=networks/classifier.json --seed=42
  verity classify --config=config/config.json
  verity cost --network=networks/classifier.json --data=data/labelled
  verity mutate --network=networks/classifier.json --alpha=0.05 --out=networks/child.json
  verity noise --image=images/test.png --alpha=0.3 --out=images/noisy.png
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "classify") {
    await classifyCmd(args.slice(1));
  } else if (command === "init") {
    await initCmd(args.slice(1));
  } else if (command === "cost") {
    await costCmd(args.slice(1));
  } else if (command === "mutate") {
    await mutateCmd(args.slice(1));
  } else if (command === "noise") {
    await noiseCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
