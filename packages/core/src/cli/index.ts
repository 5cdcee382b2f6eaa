#!/usr/bin/env node

/**
 * @file packages/core/src/cli/index.ts
 * @description Command-line entrypoints: plan a goal, or plan and run it.
 */

import 'reflect-metadata';
import { Command } from 'commander';
import chalk from 'chalk';
import { input } from '@inquirer/prompts';
import ora from 'ora';
import { TASKFORCE_VERSION, type BusMessage, type TeamPlan } from '@taskforce/shared';
import { loadConfig } from '../config.js';
import { setupContainer } from '../container.js';
import { AppError } from '../domain/errors/app-error.js';
import { Orchestrator } from '../domain/logic/orchestrator.js';
import { MessageBus, type Subscription } from '../infrastructure/events/message-bus.js';

interface GoalOptions {
  goal?: string;
  root: string;
}

const program = new Command();

program
  .name('taskforce')
  .description('Taskforce: a coordinator and a team of tool-driving specialists')
  .version(TASKFORCE_VERSION);

// ─── taskforce plan ───────────────────────────────────────────
program
  .command('plan')
  .description('Ask the orchestrator for a team plan and print it')
  .option('-g, --goal <text>', 'Goal to plan for (prompted when omitted)')
  .option('-r, --root <dir>', 'Project root holding taskforce.config.yaml and .env', process.cwd())
  .action(async (options: GoalOptions) => {
    const scope = setupContainer(loadConfig(options.root));
    const orchestrator = scope.resolve(Orchestrator);

    const goal = options.goal ?? (await askGoal());
    const spinner = ora({ text: 'Designing the team plan...', color: 'cyan' }).start();
    try {
      await orchestrator.start();
      const plan = await orchestrator.handleGoal(goal);
      spinner.succeed('Plan ready');
      printPlan(plan);
    } catch (err) {
      spinner.fail('Planning failed');
      throw err;
    }
  });

// ─── taskforce run ────────────────────────────────────────────
program
  .command('run')
  .description('Plan a goal, staff the team and stream its progress until Ctrl+C')
  .option('-g, --goal <text>', 'Goal to accomplish (prompted when omitted)')
  .option('-r, --root <dir>', 'Project root holding taskforce.config.yaml and .env', process.cwd())
  .action(async (options: GoalOptions) => {
    const scope = setupContainer(loadConfig(options.root));
    const orchestrator = scope.resolve(Orchestrator);
    const bus = scope.resolve(MessageBus);

    const goal = options.goal ?? (await askGoal());
    const controller = new AbortController();
    process.once('SIGINT', () => {
      console.log(chalk.dim('\n   Shutting down...'));
      controller.abort();
    });

    // Subscribe before anything boots so every lifecycle event is shown.
    const streams = [
      stream(bus.subscribe('status', { signal: controller.signal }), chalk.cyan),
      stream(bus.subscribe('alert', { signal: controller.signal }), chalk.red),
      stream(bus.subscribe('artifact', { signal: controller.signal }), chalk.green),
    ];

    try {
      await orchestrator.start(controller.signal);
      printPlan(await orchestrator.orchestrate(goal, controller.signal));
      console.log(chalk.dim('   Streaming team activity. Press Ctrl+C to stop.\n'));
      await Promise.all(streams);
    } catch (err) {
      // Ctrl+C while planning or booting is a normal way out.
      if (!controller.signal.aborted) throw err;
    } finally {
      controller.abort();
      await orchestrator.shutdown();
    }
  });

async function askGoal(): Promise<string> {
  return input({
    message: 'What should the team accomplish?',
    validate: (value) => value.trim().length > 0 || 'A goal is required',
  });
}

async function stream(
  subscription: Subscription,
  colour: (text: string) => string,
): Promise<void> {
  for await (const message of subscription) {
    console.log(formatMessage(message, colour));
  }
}

function formatMessage(message: BusMessage, colour: (text: string) => string): string {
  const time = new Date(message.timestamp).toLocaleTimeString();
  const { event, ...rest } = message.payload;
  const label = typeof event === 'string' ? event : message.channel;
  return `${chalk.dim(time)} ${colour(label.padEnd(20))} ${chalk.bold(message.sender)} ${JSON.stringify(rest)}`;
}

function printPlan(plan: TeamPlan): void {
  console.log(chalk.bold('\n📋 Mission'));
  console.log(`   ${plan.missionBrief || chalk.dim('(no brief)')}`);

  console.log(chalk.bold('\n👥 Roles'));
  for (const role of plan.roles) {
    console.log(`   ${chalk.cyan(role.handle)} ${role.displayName} ${chalk.dim(`: ${role.mission}`)}`);
  }

  console.log(chalk.bold('\n🧭 Workflow'));
  plan.workflow.forEach((step, index) => {
    const deps = step.dependsOn.length ? chalk.dim(` (after ${step.dependsOn.join(', ')})`) : '';
    console.log(`   ${index + 1}. ${step.name} → ${chalk.cyan(step.role)}${deps}`);
    console.log(chalk.dim(`      ${step.description}`));
  });

  console.log(chalk.bold('\n📡 Communication'));
  console.log(
    `   every ${plan.communication.intervalSeconds}s on ${plan.communication.channels.join(', ')}\n`,
  );
}

function fail(error: unknown): never {
  if (error instanceof AppError && error.isOperational) {
    console.error(chalk.red(`✗  ${error.message}`));
  } else {
    console.error(chalk.red('✗  Unexpected failure'), error);
  }
  process.exit(1);
}

program.parseAsync(process.argv).catch(fail);
