#!/usr/bin/env node

/**
 * Policy Runner CLI
 *
 * Run crossover episodes from the command line.
 */

import { runEpisode } from "./runner.js"
import { runBatch } from "./batch.js"
import { allPolicies, getPolicyById, POLICIES } from "./policies/index.js"
import type { EpisodeResult, PolicyAggregates, PolicyFactory, StepRecord } from "./types.js"
import type { EnvOptions } from "../config.js"
import { ACTION_MEANING } from "../types.js"
import { CrossoverEnv } from "../engine.js"
import { decodeAction } from "../movement.js"

export interface CliArgs {
  seed: string | undefined
  seeds: string[] | undefined
  seedCount: number | undefined
  policy: string
  batch: boolean
  fullObservable: boolean
  stepCost: number | undefined
  gridWidth: number | undefined
  stallWindowSize: number | undefined
  render: boolean
  verbose: boolean
  help: boolean
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    seed: undefined,
    seeds: undefined,
    seedCount: undefined,
    policy: "sequential",
    batch: false,
    fullObservable: false,
    stepCost: undefined,
    gridWidth: undefined,
    stallWindowSize: undefined,
    render: false,
    verbose: false,
    help: false,
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]

    if (arg === "--help" || arg === "-h") {
      parsed.help = true
    } else if (arg === "--seed" || arg === "-s") {
      parsed.seed = args[++i]
    } else if (arg === "--seeds") {
      parsed.seeds = (args[++i] ?? "").split(",").filter((s) => s.length > 0)
    } else if (arg === "--seed-count" || arg === "-n") {
      parsed.seedCount = parseInt(args[++i], 10)
    } else if (arg === "--policy" || arg === "-p") {
      parsed.policy = args[++i]
    } else if (arg === "--batch" || arg === "-b") {
      parsed.batch = true
    } else if (arg === "--full-observable") {
      parsed.fullObservable = true
    } else if (arg === "--step-cost") {
      parsed.stepCost = parseFloat(args[++i])
    } else if (arg === "--grid-width") {
      parsed.gridWidth = parseInt(args[++i], 10)
    } else if (arg === "--stall-window") {
      parsed.stallWindowSize = parseInt(args[++i], 10)
    } else if (arg === "--render" || arg === "-r") {
      parsed.render = true
    } else if (arg === "--verbose" || arg === "-v") {
      parsed.verbose = true
    }
  }

  return parsed
}

/**
 * Print usage information
 */
function printHelp(): void {
  console.log(`
Crossover Policy Runner - Run crossover episodes

USAGE:
  npx tsx src/policy-runner/cli.ts [options]

OPTIONS:
  -s, --seed <seed>       Single seed for reproducible run
  --seeds <s1,s2,...>     Comma-separated list of seeds for batch
  -n, --seed-count <n>    Number of generated seeds for batch (default: 100)
  -p, --policy <name>     Policy: ${Object.keys(POLICIES).join(", ")}, all (default: sequential)
  -b, --batch             Run batch mode (multiple seeds)
  --full-observable       Give every agent the joint observation
  --step-cost <x>         Reward for agents not reaching their goal on a step (default: 0)
  --grid-width <n>        Corridor width in cells, 4 to 64 (default: 8)
  --stall-window <n>      Steps without any movement before stall (default: 20)
  -r, --render            Print the grid after every step (single run only)
  -v, --verbose           Show per-step actions and rewards
  -h, --help              Show this help message

EXAMPLES:
  # Single run with a specific seed
  npx tsx src/policy-runner/cli.ts --seed test-1 --policy random --render

  # Batch run comparing all policies
  npx tsx src/policy-runner/cli.ts --batch --seed-count 20 --policy all
`)
}

export function formatActions(actions: number[]): string {
  return actions.map((code, agentId) => ACTION_MEANING[decodeAction(agentId, code)]).join(" ")
}

export function formatStepRecord(record: StepRecord): string {
  const rewards = record.rewards.join(",")
  const dones = record.dones.map((d) => (d ? "1" : "0")).join("")
  const blocked = record.blocked > 0 ? ` blocked=${record.blocked}` : ""
  return `[${String(record.step).padStart(3)}] ${formatActions(record.actions)} rewards=${rewards} dones=${dones}${blocked}`
}

export function formatEpisodeResult(result: EpisodeResult): string {
  const goals = result.goalSteps.map((s) => (s === null ? "-" : String(s))).join(",")
  return [
    `policy=${result.policyId} seed=${result.seed}`,
    `  termination: ${result.terminationReason} after ${result.steps} steps`,
    `  agents at goal: ${result.agentsAtGoal} (steps ${goals})`,
    `  rewards: ${result.totalRewards.join(", ")} (team ${result.teamReward})`,
    `  blocked moves: ${result.blockedMoves}`,
  ].join("\n")
}

export function formatAggregates(agg: PolicyAggregates): string {
  const failures = Object.entries(agg.failureCounts)
    .map(([reason, count]) => `${reason}=${count}`)
    .join(" ")
  return [
    `${agg.policyId} (${agg.runCount} runs)`,
    `  success rate: ${(agg.successRate * 100).toFixed(1)}%${failures ? `  failures: ${failures}` : ""}`,
    `  steps to goal p10/p50/p90: ${agg.stepsToGoal.p10}/${agg.stepsToGoal.p50}/${agg.stepsToGoal.p90}`,
    `  avg team reward: ${agg.avgTeamReward.toFixed(2)}  avg at goal: ${agg.avgAgentsAtGoal.toFixed(2)}  avg blocked: ${agg.avgBlockedMoves.toFixed(2)}`,
  ].join("\n")
}

function requirePositiveInt(flag: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw new Error(`${flag} must be a positive integer, got ${value}`)
  }
}

function resolvePolicies(name: string): PolicyFactory[] {
  if (name === "all") return allPolicies
  const policy = getPolicyById(name)
  if (!policy) {
    throw new Error(`Unknown policy: ${name}. Available: ${Object.keys(POLICIES).join(", ")}, all`)
  }
  return [policy]
}

function runSingle(args: CliArgs, env: EnvOptions, policy: PolicyFactory): void {
  const seed = args.seed ?? `seed-${Date.now()}`
  // Only used to draw the grid; it replays the same actions as the runner.
  const viewEnv = args.render ? new CrossoverEnv(env) : null
  if (viewEnv) {
    viewEnv.reset()
    console.log(viewEnv.render("ansi"))
    console.log("")
  }

  const result = runEpisode({
    seed,
    policy,
    env,
    stallWindowSize: args.stallWindowSize,
    onStep: (record) => {
      if (args.verbose) {
        console.log(formatStepRecord(record))
      }
      if (viewEnv) {
        viewEnv.step(record.actions)
        console.log(viewEnv.render("ansi"))
        console.log("")
      }
    },
  })
  viewEnv?.close()
  console.log(formatEpisodeResult(result))
}

function runMany(args: CliArgs, env: EnvOptions, policies: PolicyFactory[]): void {
  const start = Date.now()
  const result = runBatch({
    seeds: args.seeds,
    seedCount: args.seedCount,
    policies,
    env,
    stallWindowSize: args.stallWindowSize,
  })
  for (const agg of Object.values(result.aggregates.byPolicy)) {
    console.log(formatAggregates(agg))
  }
  console.log(`\n${result.results.length} episodes in ${Date.now() - start}ms`)
}

export function main(argv: string[]): number {
  const args = parseArgs(argv)
  if (args.help) {
    printHelp()
    return 0
  }

  const env: EnvOptions = {
    fullObservable: args.fullObservable,
    stepCost: args.stepCost,
    gridWidth: args.gridWidth,
  }

  try {
    requirePositiveInt("--seed-count", args.seedCount)
    requirePositiveInt("--stall-window", args.stallWindowSize)
    const policies = resolvePolicies(args.policy)
    if (args.batch) {
      runMany(args, env, policies)
    } else {
      if (policies.length !== 1) {
        throw new Error("--policy all is only supported in batch mode")
      }
      runSingle(args, env, policies[0])
    }
    return 0
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.error(`Error: ${message}`)
    return 1
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2))
}
