import { promises as fs } from 'fs';
import chalk from 'chalk';
import { ErrorHandler, hasErrors, inspectWorkflow, timeout, type WorkflowIssue } from '@pigeonpost/utils';
import { createContext, type CommandContext } from '../context.js';

export const DEFAULT_WORKFLOW_PATH = '.github/workflows/generate.yaml';

export interface DoctorOptions {
  workflow?: string;
  online?: boolean;
}

export interface DoctorCheck {
  name: string;
  ok: boolean;
  detail?: string;
}

export interface DoctorReport {
  checks: DoctorCheck[];
  workflowIssues: WorkflowIssue[];
  failures: number;
}

export async function doctorCommand(options: DoctorOptions, context: CommandContext = createContext()): Promise<DoctorReport> {
  const checks: DoctorCheck[] = [];

  console.log(chalk.bold('Environment'));
  for (const { name, set } of context.config.describe()) {
    checks.push({ name, ok: set, detail: set ? 'set' : 'not set' });
    printCheck(name, set, set ? 'set' : 'not set');
  }

  console.log(chalk.bold('\nWorkflow'));
  const workflowPath = options.workflow ?? DEFAULT_WORKFLOW_PATH;
  let workflowIssues: WorkflowIssue[] = [];
  try {
    const report = inspectWorkflow(await fs.readFile(workflowPath, 'utf-8'));
    workflowIssues = report.issues;
    const ok = !hasErrors(report);
    checks.push({ name: workflowPath, ok, detail: `triggers: ${report.triggers.join(', ') || 'none'}` });
    printCheck(workflowPath, ok, `triggers: ${report.triggers.join(', ') || 'none'}`);
    for (const issue of workflowIssues) {
      const colour = issue.severity === 'error' ? chalk.red : chalk.yellow;
      console.log(colour(`    ${issue.severity}: ${issue.path || '(root)'} ${issue.message}`));
    }
  } catch (error) {
    checks.push({ name: workflowPath, ok: false, detail: ErrorHandler.describe(error) });
    printCheck(workflowPath, false, ErrorHandler.describe(error));
  }

  if (options.online) {
    console.log(chalk.bold('\nMastodon'));
    const limit = context.config.timeoutMs;
    for (const [name, verify] of [
      ['app credentials', async () => (await context.mastodonClient().verifyApp()).scope],
      ['account credentials', async () => `@${(await context.mastodonClient().verifyCredentials()).acct}`],
    ] as const) {
      try {
        const detail = await timeout(verify(), limit, `${name} check timed out`);
        checks.push({ name, ok: true, detail });
        printCheck(name, true, detail);
      } catch (error) {
        checks.push({ name, ok: false, detail: ErrorHandler.describe(error) });
        printCheck(name, false, ErrorHandler.describe(error));
      }
    }
  }

  const failures = checks.filter((check) => !check.ok).length;
  console.log(failures === 0 ? chalk.green('\nAll checks passed') : chalk.red(`\n${failures} check(s) failed`));

  return { checks, workflowIssues, failures };
}

function printCheck(name: string, ok: boolean, detail: string) {
  console.log(`  ${ok ? chalk.green('✓') : chalk.red('✗')} ${name} ${chalk.gray(detail)}`);
}
