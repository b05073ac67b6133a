import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runPruneAction } from '../../../src/cli/actions/pruneAction.js';
import { printCompletion, printSummary } from '../../../src/cli/cliPrint.js';
import { generateReport } from '../../../src/core/output/reportGenerate.js';
import { writeOutputToDisk } from '../../../src/core/output/writeOutputToDisk.js';
import { type PruneEvaluation, evaluatePrune } from '../../../src/core/pruner.js';

vi.mock('../../../src/core/pruner.js', () => ({
  evaluatePrune: vi.fn(),
}));
vi.mock('../../../src/core/output/reportGenerate.js', () => ({
  generateReport: vi.fn(),
}));
vi.mock('../../../src/core/output/writeOutputToDisk.js', () => ({
  writeOutputToDisk: vi.fn(),
}));
vi.mock('../../../src/cli/cliPrint.js', () => ({
  printSummary: vi.fn(),
  printCompletion: vi.fn(),
}));
vi.mock('../../../src/shared/logger.js', () => ({
  kubePruneLogLevels: { SILENT: -1, ERROR: 0, WARN: 1, INFO: 2, DEBUG: 3 },
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    log: vi.fn(),
  },
}));

const createEvaluation = (error = 0): PruneEvaluation => ({
  namespace: 'default',
  kinds: ['ConfigMap'],
  decisions: [],
  counts: { prune: 1, keep: 2, skipped: 0, error },
});

describe('runPruneAction', () => {
  let cwd: string;

  beforeEach(async () => {
    // An empty directory holds no config file
    cwd = await mkdtemp(path.join(os.tmpdir(), 'kubeprune-action-'));
    vi.mocked(generateReport).mockReturnValue('REPORT');
    vi.mocked(writeOutputToDisk).mockResolvedValue('/work/report.json');
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
    vi.clearAllMocks();
    await rm(cwd, { recursive: true, force: true });
  });

  it('prints the text report and summary to stdout', async () => {
    const evaluation = createEvaluation();
    vi.mocked(evaluatePrune).mockResolvedValue(evaluation);

    await expect(runPruneAction({}, cwd)).resolves.toBe(evaluation);

    expect(generateReport).toHaveBeenCalledWith(evaluation, 'text');
    expect(process.stdout.write).toHaveBeenCalledWith('REPORT');
    expect(writeOutputToDisk).not.toHaveBeenCalled();
    expect(printSummary).toHaveBeenCalledWith(evaluation, expect.anything(), undefined);
    expect(printCompletion).toHaveBeenCalledWith(evaluation);
    expect(process.exitCode).toBeUndefined();
  });

  it('keeps stdout to the report alone for json without a file', async () => {
    vi.mocked(evaluatePrune).mockResolvedValue(createEvaluation());

    await runPruneAction({ style: 'json' }, cwd);

    expect(process.stdout.write).toHaveBeenCalledTimes(1);
    expect(process.stdout.write).toHaveBeenCalledWith('REPORT');
    expect(printSummary).not.toHaveBeenCalled();
    expect(printCompletion).not.toHaveBeenCalled();
  });

  it('writes the report to disk when an output file is given', async () => {
    const evaluation = createEvaluation();
    vi.mocked(evaluatePrune).mockResolvedValue(evaluation);

    await runPruneAction({ style: 'json', output: 'report.json' }, cwd);

    expect(writeOutputToDisk).toHaveBeenCalledTimes(1);
    expect(vi.mocked(writeOutputToDisk).mock.calls[0][0]).toBe('REPORT');
    expect(vi.mocked(writeOutputToDisk).mock.calls[0][1].output.filePath).toBe('report.json');
    expect(process.stdout.write).not.toHaveBeenCalled();
    expect(printSummary).toHaveBeenCalledWith(evaluation, expect.anything(), '/work/report.json');
  });

  it('sets a failing exit code when a candidate could not be decided', async () => {
    vi.mocked(evaluatePrune).mockResolvedValue(createEvaluation(1));

    await runPruneAction({}, cwd);

    expect(process.exitCode).toBe(1);
  });
});
