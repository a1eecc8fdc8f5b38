import { afterAll, beforeAll, describe, expect, it } from '@jest/globals';
import { readFile } from 'node:fs/promises';
import { runCli } from '../../src/cli.js';
import { FIXED_STAMP, captureLines, createWorkspace, fixedClock, type Workspace } from '../helpers/workspace.js';

/**
 * End-to-end run of the command line over a notebook exported from a hosted
 * environment, with broken widget state at both levels.
 */
describe('fix-notebook end to end', () => {
  let workspace: Workspace;
  let target: string;
  let exitCode: number;
  const output = captureLines();

  const original = JSON.stringify({
    cells: [
      { cell_type: 'markdown', metadata: {}, source: ['# Título'] },
      {
        cell_type: 'code',
        execution_count: 1,
        metadata: { id: 'abc', widgets: { version_major: 2 } },
        outputs: [],
        source: ['print(1)']
      }
    ],
    metadata: {
      kernelspec: { display_name: 'Python 3', name: 'python3' },
      widgets: { 'application/vnd.jupyter.widget-state+json': { state: {} } }
    },
    nbformat: 4,
    nbformat_minor: 5
  });

  beforeAll(async () => {
    workspace = await createWorkspace();
    target = await workspace.write('analysis.ipynb', original);
    exitCode = await runCli([target], { env: {}, sink: output.sink, repairer: { clock: fixedClock } });
  });

  afterAll(async () => {
    await workspace.dispose();
  });

  it('exits 0 and reports each removal in document order', () => {
    const backupPath = `${target}.bak-${FIXED_STAMP}`;
    expect(exitCode).toBe(0);
    expect(output.lines).toEqual([
      'Removing malformed widgets metadata at notebook level',
      'Removing malformed widgets metadata from cell 1',
      `Created backup: ${backupPath}`,
      `Successfully fixed: ${target}`
    ]);
  });

  it('writes the repaired notebook', async () => {
    expect(await workspace.read('analysis.ipynb')).toBe(
      [
        '{',
        '  "cells": [',
        '    {',
        '      "cell_type": "markdown",',
        '      "metadata": {},',
        '      "source": [',
        '        "# Título"',
        '      ]',
        '    },',
        '    {',
        '      "cell_type": "code",',
        '      "execution_count": 1,',
        '      "metadata": {',
        '        "id": "abc"',
        '      },',
        '      "outputs": [],',
        '      "source": [',
        '        "print(1)"',
        '      ]',
        '    }',
        '  ],',
        '  "metadata": {',
        '    "kernelspec": {',
        '      "display_name": "Python 3",',
        '      "name": "python3"',
        '    }',
        '  },',
        '  "nbformat": 4,',
        '  "nbformat_minor": 5',
        '}',
        ''
      ].join('\n')
    );
  });

  it('keeps a byte-identical backup of the input', async () => {
    expect(await readFile(`${target}.bak-${FIXED_STAMP}`, 'utf8')).toBe(original);
  });

  it('finds nothing to do on a second run', async () => {
    const again = captureLines();
    const code = await runCli([target], { env: {}, sink: again.sink, repairer: { clock: fixedClock } });

    expect(code).toBe(0);
    expect(again.lines).toEqual([`No malformed widget metadata found in: ${target}`]);
    expect(await workspace.list()).toEqual(['analysis.ipynb', `analysis.ipynb.bak-${FIXED_STAMP}`]);
  });
});
