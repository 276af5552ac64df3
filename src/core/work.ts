import fs from 'node:fs/promises';
import path from 'node:path';
import writeFileAtomic from 'write-file-atomic';
import {
  DEFAULT_FORMULA_NAME,
  WORK_DOCUMENTS,
  defaultFormula,
  hookFormula,
  hookTemplate,
  workDocumentTemplate,
} from '../bundled/templates.js';
import { FormulaNotFoundError, HookExistsError } from '../lib/errors.js';
import { isMissingFileError, pathExists } from '../lib/fs.js';
import { formulaDir, formulaPath, hookPath, workDir } from '../lib/paths.js';

export interface Task {
  done: boolean;
  description: string;
}

export interface Progress {
  status: string;
  assignee: string;
  tasks: Task[];
  notes: string;
}

export interface ParseWarning {
  line: number;
  text: string;
  reason: string;
}

export interface ParsedProgress {
  progress: Progress;
  warnings: ParseWarning[];
}

export interface ScaffoldResult {
  created: string[];
  skipped: string[];
  formulaInstalled: boolean;
}

/**
 * Create `work/<name>/` with the four workflow documents and make sure a
 * formula exists. Existing files are never overwritten.
 */
export async function createWorkItem(root: string, workName: string): Promise<ScaffoldResult> {
  const dir = workDir(root, workName);
  await fs.mkdir(dir, { recursive: true });
  await fs.mkdir(formulaDir(root), { recursive: true });

  const created: string[] = [];
  const skipped: string[] = [];

  for (const doc of WORK_DOCUMENTS) {
    const file = path.join(dir, doc);
    if (await pathExists(file)) {
      skipped.push(doc);
      continue;
    }
    await writeFileAtomic(file, workDocumentTemplate(doc, workName));
    created.push(doc);
  }

  let formulaInstalled = false;
  if ((await listFormulas(root)).length === 0) {
    await writeFileAtomic(formulaPath(root, DEFAULT_FORMULA_NAME), defaultFormula);
    formulaInstalled = true;
  }

  return { created, skipped, formulaInstalled };
}

const STATUS_RE = /^##\s*Status:\s*(.+)$/i;
const ASSIGNED_RE = /^##\s*Assigned to:\s*(.*)$/i;
const CHECKLIST_RE = /^##\s*Checklist\s*$/i;
const NOTES_RE = /^##\s*Notes\s*$/i;
const TASK_RE = /^-\s*\[(.?)\]\s*(.+)$/;

/**
 * Line-oriented parse of a progress document. Never throws: lines that
 * are not understood are skipped, and checklist lines that look like
 * tasks but do not parse are reported as warnings.
 */
export function parseProgress(content: string): ParsedProgress {
  const progress: Progress = { status: '', assignee: '', tasks: [], notes: '' };
  const warnings: ParseWarning[] = [];
  const notes: string[] = [];
  let section: 'none' | 'checklist' | 'notes' = 'none';

  content.split(/\r?\n/).forEach((line, index) => {
    const status = line.match(STATUS_RE);
    if (status) {
      progress.status = status[1].trim();
      return;
    }

    const assigned = line.match(ASSIGNED_RE);
    if (assigned) {
      progress.assignee = assigned[1].trim();
      return;
    }

    if (CHECKLIST_RE.test(line)) {
      section = 'checklist';
      return;
    }

    if (NOTES_RE.test(line)) {
      section = 'notes';
      return;
    }

    if (section === 'checklist') {
      const task = line.match(TASK_RE);
      if (task) {
        progress.tasks.push({
          done: task[1].toLowerCase() === 'x',
          description: task[2].trim(),
        });
      } else if (line.trimStart().startsWith('-')) {
        warnings.push({ line: index + 1, text: line, reason: 'not a checklist item' });
      }
    } else if (section === 'notes' && line.trim() !== '') {
      notes.push(line);
    }
  });

  progress.notes = notes.join('\n');
  return { progress, warnings };
}

export async function readProgress(file: string): Promise<ParsedProgress> {
  return parseProgress(await fs.readFile(file, 'utf-8'));
}

/** First unfinished task, or null when all are done or there are none. */
export function currentTask(progress: Progress): string | null {
  const task = progress.tasks.find((t) => !t.done);
  return task ? task.description : null;
}

export async function listFormulas(root: string): Promise<string[]> {
  let files: string[];
  try {
    files = await fs.readdir(formulaDir(root));
  } catch (err) {
    if (isMissingFileError(err)) return [];
    throw err;
  }
  return files
    .filter((f) => f.endsWith('.md'))
    .map((f) => f.slice(0, -'.md'.length))
    .sort();
}

export type HookResult = 'created' | 'existing';

/**
 * Write `work/<name>/hook.md` for `formula`. A hook is written once: an
 * existing hook for the same formula is left alone, one for any other
 * formula must be deleted by hand first.
 */
export async function generateHook(root: string, workName: string, formula: string): Promise<HookResult> {
  if (!(await pathExists(formulaPath(root, formula)))) {
    throw new FormulaNotFoundError(formula, await listFormulas(root));
  }

  const file = hookPath(root, workName);
  const existing = await readHook(root, workName);
  if (existing !== null) {
    const recorded = hookFormula(existing);
    if (recorded === formula) return 'existing';
    throw new HookExistsError(workName, recorded, formula);
  }

  await writeFileAtomic(file, hookTemplate(workName, formula));
  return 'created';
}

export async function readHook(root: string, workName: string): Promise<string | null> {
  try {
    return await fs.readFile(hookPath(root, workName), 'utf-8');
  } catch (err) {
    if (isMissingFileError(err)) return null;
    throw err;
  }
}
