#!/usr/bin/env tsx
/**
 * lockstep CLI — the main entry point.
 *
 * Commands: train, checkpoints
 */
import { trainCmd } from "./commands/train.js";
import { checkpointsCmd } from "./commands/checkpoints.js";

const USAGE = `
lockstep — epoch-driven training with resumable checkpoints

Commands:
  train            Train a linear model on a synthetic regression task
  checkpoints      List checkpoints and show which one --resume would pick

Train options (all --key=value; "none" disables the nullable ones):
  --config=FILE            JSON TrainConfig, overridden by the flags below
  --batch --validBatch --lr --momentum --optim=sgd|adamw --accumSteps
  --maxEpochs --patience --keep --checkpointEvery --samplesPerEpoch
  --workers --prefetch --seed --log=debug|info|warn|error
  --runDir=DIR --resume=GLOB --initModel=FILE
  --strictResume=false     Drop model parameters that no longer fit on resume
  --samples --features --noise

Checkpoints options:
  --dir=DIR --pattern=GLOB

Options:
  --help, -h       Show this help

Examples:
  lockstep train --runDir=runs/demo --maxEpochs=20 --keep=3
  lockstep train --runDir=runs/demo --resume="epoch-*.ckpt"
  lockstep train --runDir=runs/wide --initModel=runs/demo/lowest-valid-loss.ckpt
  lockstep checkpoints --dir=runs/demo --pattern="epoch-*.ckpt"
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "train") {
    await trainCmd(args.slice(1));
  } else if (command === "checkpoints") {
    await checkpointsCmd(args.slice(1));
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
