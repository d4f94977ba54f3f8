#!/usr/bin/env node

import { resolve } from "node:path";

import { createConsoleLogger, isInputRequiredEvent, isStopEvent } from "@formpilot/core";
import chalk from "chalk";
import { Command } from "commander";
import ora from "ora";
import prompts from "prompts";

import { createJobApplicationFromConfig } from "./bootstrap.js";
import { loadConfig } from "./config.js";

interface FillOptions {
  resume: string;
  form: string;
}

const askForFeedback = async (message: string): Promise<string | undefined> => {
  const answer = await prompts({
    type: "text",
    name: "feedback",
    message,
    validate: (value: string) => (value.trim() === "" ? "Feedback cannot be empty" : true),
  });

  return typeof answer.feedback === "string" ? answer.feedback : undefined;
};

const fill = async ({ resume, form }: FillOptions) => {
  const config = loadConfig();
  const logger = createConsoleLogger({ name: "formpilot", level: config.logLevel });
  const workflow = createJobApplicationFromConfig(config, logger);

  console.log(chalk.bold.cyan("\nFilling in your application form\n"));

  const run = workflow.run({ resume: resolve(resume), form: resolve(form) });
  const spinner = ora("Reading the resume and the form...").start();

  try {
    for await (const event of run.events()) {
      spinner.stop();

      if (isInputRequiredEvent<string>(event)) {
        console.log(chalk.green("\nWe've filled in your form! Here are the results:\n"));
        console.log(event.payload.result);
        console.log();

        const feedback = await askForFeedback(event.payload.prefix);
        if (feedback === undefined) {
          run.cancel("Cancelled from the terminal");
          break;
        }

        run.resumeWithHumanInput({ response: feedback });
        spinner.start("Reviewing your feedback...");
      } else if (isStopEvent<string>(event)) {
        console.log(chalk.green.bold("\nAll done! Here's your final form:\n"));
        console.log(event.payload.result);
        console.log();
      }
    }

    await run.result();
  } catch (error) {
    spinner.stop();
    if (run.status === "cancelled") {
      console.log(chalk.yellow("\nForm filling cancelled\n"));
      return;
    }

    console.error(chalk.red("\nForm filling failed:"), error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
};

const program = new Command();

program
  .name("formpilot")
  .description("Fill job application forms from a resume, with your review");

program
  .command("fill")
  .description("Fill an application form and iterate on it with your feedback")
  .requiredOption("-r, --resume <path>", "resume document (.txt, .md or .json)")
  .requiredOption("-f, --form <path>", "application form document (.txt, .md or .json)")
  .action(fill);

try {
  await program.parseAsync(process.argv);
} catch (error) {
  console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
