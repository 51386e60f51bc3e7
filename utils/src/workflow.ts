import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { REQUIRED_SECRETS } from './config.js';

// ============================================================================
// Types
// ============================================================================

export interface WorkflowIssue {
  path: string;
  message: string;
  severity: 'error' | 'warning';
}

export interface WorkflowStepSummary {
  job: string;
  index: number;
  name: string;
  uses?: string;
  run?: string;
}

export interface WorkflowReport {
  name?: string;
  triggers: string[];
  steps: WorkflowStepSummary[];
  issues: WorkflowIssue[];
}

// ============================================================================
// Schema
// ============================================================================

const stepSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    uses: z.string().optional(),
    run: z.string().optional(),
    shell: z.string().optional(),
    with: z.record(z.unknown()).optional(),
    env: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  })
  .passthrough();

const jobSchema = z
  .object({
    name: z.string().optional(),
    'runs-on': z.union([z.string(), z.array(z.string())]).optional(),
    steps: z.array(stepSchema).optional(),
  })
  .passthrough();

const workflowSchema = z
  .object({
    name: z.string().optional(),
    // `on: workflow_dispatch`, `on: [push, workflow_dispatch]` and the mapping form are all valid
    on: z.union([z.string(), z.array(z.string()), z.record(z.unknown())]).optional(),
    permissions: z.union([z.string(), z.record(z.string())]).optional(),
    jobs: z.record(jobSchema).optional(),
  })
  .passthrough();

type WorkflowStep = z.infer<typeof stepSchema>;

/** Matches the step that launches the CLI, however it is spelled. */
const CLI_INVOCATION = /\bpigeonpost\b|cli\/src\/index\.ts|npm (run )?start\b/;

// ============================================================================
// Inspection
// ============================================================================

export function inspectWorkflow(source: string): WorkflowReport {
  let document: unknown;
  try {
    document = parseYaml(source);
  } catch (error) {
    return {
      triggers: [],
      steps: [],
      issues: [{ path: '', message: `Invalid YAML: ${error instanceof Error ? error.message : String(error)}`, severity: 'error' }],
    };
  }

  const parsed = workflowSchema.safeParse(document);
  if (!parsed.success) {
    return {
      triggers: [],
      steps: [],
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
        severity: 'error' as const,
      })),
    };
  }

  const workflow = parsed.data;
  const issues: WorkflowIssue[] = [];
  const triggers = listTriggers(workflow.on);

  if (!triggers.includes('workflow_dispatch')) {
    issues.push({ path: 'on', message: 'Manual dispatch (workflow_dispatch) is not enabled', severity: 'error' });
  }

  const contents = typeof workflow.permissions === 'string' ? workflow.permissions : workflow.permissions?.contents;
  if (contents !== 'write' && contents !== 'write-all') {
    issues.push({ path: 'permissions.contents', message: 'Contents must be writable to commit generated images', severity: 'error' });
  }

  const jobs = Object.entries(workflow.jobs ?? {});
  if (jobs.length === 0) {
    issues.push({ path: 'jobs', message: 'Workflow defines no jobs', severity: 'error' });
  }

  const steps: WorkflowStepSummary[] = [];
  const cliSteps: Array<{ path: string; step: WorkflowStep }> = [];

  for (const [jobId, job] of jobs) {
    const jobSteps = job.steps ?? [];
    if (jobSteps.length === 0) {
      issues.push({ path: `jobs.${jobId}.steps`, message: 'Job has no steps', severity: 'error' });
      continue;
    }

    if (!jobSteps[0]?.uses?.startsWith('actions/checkout@')) {
      issues.push({ path: `jobs.${jobId}.steps[0]`, message: 'First step should check out the repository', severity: 'warning' });
    }

    jobSteps.forEach((step, index) => {
      steps.push({
        job: jobId,
        index,
        name: step.name ?? step.id ?? step.uses ?? `step ${index + 1}`,
        uses: step.uses,
        run: step.run,
      });
      if (step.run !== undefined && CLI_INVOCATION.test(step.run)) {
        cliSteps.push({ path: `jobs.${jobId}.steps[${index}]`, step });
      }
    });
  }

  if (cliSteps.length === 0 && jobs.length > 0) {
    issues.push({ path: 'jobs', message: 'No step invokes the pigeonpost CLI', severity: 'error' });
  }

  for (const { path, step } of cliSteps) {
    for (const secret of REQUIRED_SECRETS) {
      const value = step.env?.[secret];
      const expected = new RegExp(`^\\$\\{\\{\\s*secrets\\.${secret}\\s*\\}\\}$`);
      if (typeof value !== 'string' || !expected.test(value.trim())) {
        issues.push({ path: `${path}.env.${secret}`, message: `Expected \${{ secrets.${secret} }}`, severity: 'error' });
      }
    }
  }

  return { name: workflow.name, triggers, steps, issues };
}

function listTriggers(on: z.infer<typeof workflowSchema>['on']): string[] {
  if (on === undefined) return [];
  if (typeof on === 'string') return [on];
  if (Array.isArray(on)) return [...on];
  return Object.keys(on);
}

export function hasErrors(report: WorkflowReport): boolean {
  return report.issues.some((issue) => issue.severity === 'error');
}
