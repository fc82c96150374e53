import { Command, CommanderError } from "commander";
import { addComment } from "./commands/comment.js";
import type { CommandContext } from "./commands/context.js";
import { getIssue, type GetOptions } from "./commands/get.js";
import { changeStatus, type StatusOptions } from "./commands/status.js";
import { logTime } from "./commands/time.js";
import { loadConfig, missingCredentials, type Environment } from "./lib/config.js";
import { describeError, JiraToolError, usageError } from "./lib/errors.js";
import { JiraClient } from "./lib/jira/client.js";
import { createLogger, type LogSink, type Logger } from "./lib/logging.js";
import { assertPrerequisites } from "./lib/prerequisites.js";
import { createTransport, type FetchFn } from "./lib/transport/index.js";

export const VERSION = "1.0.0";

export interface CliOptions {
  env?: Environment;
  cwd?: string;
  stdout?: LogSink;
  stderr?: LogSink;
  fetchFn?: FetchFn;
}

interface GlobalOptions {
  testMode?: boolean;
  verbose?: boolean;
}

function requireText(words: string[], what: string): string {
  const text = words.join(" ");
  if (text.trim() === "") {
    throw usageError(`${what} is required. Use --help for usage information.`);
  }
  return text;
}

/**
 * Parses argv, runs one command and returns the process exit code. Every
 * failure is reported here and nowhere else.
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  let exitCode = 0;
  let logger: Logger = createLogger({ stdout: options.stdout, stderr: options.stderr });
  const writeOut = options.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  const writeErr = options.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));

  const program = new Command();

  const initialize = (): CommandContext => {
    const globals = program.opts<GlobalOptions>();
    logger = createLogger({ stdout: options.stdout, stderr: options.stderr, verbose: globals.verbose });

    logger.info("Initializing JIRA Tool...");
    assertPrerequisites();

    const config = loadConfig(logger, { env: options.env, cwd: options.cwd, testMode: globals.testMode });
    if (config.testMode) {
      logger.info("Running in test mode - skipping environment validation");
    } else {
      const missing = missingCredentials(config.credentials);
      if (missing.length > 0) {
        throw new JiraToolError({ kind: "MissingCredentials", missing });
      }
      logger.info("Environment variables loaded successfully");
    }

    return { client: new JiraClient(createTransport(config, logger, options.fetchFn)), logger };
  };

  const run = async (action: (context: CommandContext) => Promise<void>): Promise<void> => {
    try {
      await action(initialize());
    } catch (error) {
      const report = describeError(error);
      for (const line of report.errors) {
        logger.error(line);
      }
      logger.fatal(report.fatal);
      for (const line of report.details) {
        logger.printError(line);
      }
      exitCode = 1;
    }
  };

  program
    .name("jira-tool")
    .description("Command line interface for JIRA: view issues, change status, comment and log time")
    .version(VERSION)
    .option("--test-mode", "Use canned responses instead of calling JIRA (same as JIRA_TEST_MODE=true)")
    .option("--verbose", "Log every request sent to JIRA")
    .showHelpAfterError()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => writeOut(text.trimEnd()),
      writeErr: (text) => writeErr(text.trimEnd()),
    })
    .addHelpText(
      "after",
      `
Environment Variables Required:
  JIRA_BASE_URL      Your JIRA instance URL (e.g., https://company.atlassian.net)
  JIRA_EMAIL         Your email address
  JIRA_API_TOKEN     Your API token from JIRA
  JIRA_TEST_MODE     Set to "true" to use canned responses`,
    );

  program
    .command("get")
    .description("Fetch and display JIRA issue details")
    .argument("<issue-key-or-url>", "Issue key (PROJ-123) or browse URL")
    .option("--raw", "Dump full JSON response")
    .addHelpText(
      "after",
      `
Examples:
  $ jira-tool get PROJ-123
  $ jira-tool get https://company.atlassian.net/browse/PROJ-123
  $ jira-tool get --raw PROJ-123`,
    )
    .action((input: string, commandOptions: GetOptions) => run((context) => getIssue(context, input, commandOptions)));

  program
    .command("status")
    .description("Change issue status via transitions, or list the available transitions")
    .argument("<issue-key-or-url>", "Issue key (PROJ-123) or browse URL")
    .argument("[new-status]", "Target status name (case-insensitive)")
    .option("--list", "List available transitions for the issue")
    .addHelpText(
      "after",
      `
Examples:
  $ jira-tool status PROJ-123                    # List available transitions
  $ jira-tool status PROJ-123 'In Progress'      # Transition to 'In Progress'
  $ jira-tool status PROJ-123 done               # Transition to 'Done' (case-insensitive)
  $ jira-tool status --list PROJ-123             # List available transitions`,
    )
    .action((input: string, desiredStatus: string | undefined, commandOptions: StatusOptions) =>
      run((context) => changeStatus(context, input, desiredStatus, commandOptions)),
    );

  program
    .command("comment")
    .description("Add a comment to a JIRA issue")
    .argument("<issue-key-or-url>", "Issue key (PROJ-123) or browse URL")
    .argument("<text...>", "Comment text; extra words are joined with spaces")
    .addHelpText(
      "after",
      `
Examples:
  $ jira-tool comment PROJ-123 'This is a comment'
  $ jira-tool comment https://company.atlassian.net/browse/PROJ-123 'Bug fix applied'`,
    )
    .action((input: string, words: string[]) =>
      run((context) => addComment(context, input, requireText(words, "Comment text"))),
    );

  program
    .command("time")
    .description("Log work time to a JIRA issue")
    .argument("<issue-key-or-url>", "Issue key (PROJ-123) or browse URL")
    .argument("<duration>", "Time spent, e.g. '2h 30m' or '1d 4h'")
    .argument("<description...>", "Worklog description; extra words are joined with spaces")
    .addHelpText(
      "after",
      `
Duration format follows Jira time tracking conventions:
  w = weeks (5 working days)
  d = days (8 working hours)
  h = hours (60 minutes)
  m = minutes (60 seconds)

Examples:
  $ jira-tool time PROJ-123 '2h 30m' 'Development work completed'
  $ jira-tool time PROJ-123 '1w 2d 4h 30m' 'Project milestone completed'`,
    )
    .action((input: string, duration: string, words: string[]) =>
      run((context) => logTime(context, input, duration, requireText(words, "Description"))),
    );

  if (argv.length <= 2) {
    program.outputHelp({ error: true });
    return 1;
  }

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
