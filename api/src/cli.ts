#!/usr/bin/env node
import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import { ValidationError } from './errors';
import { logger } from './logger';
import { validateWeights } from './middleware/validation';
import { FULL_EXPORT_FILE, generateCSV, generateSectionCSVs } from './services/exportService';
import { runGradebook } from './services/gradebookService';
import { gradeHistogram, studentReport } from './services/reportService';
import { SourceFile } from './types';

const USAGE = 'Usage: gradebook --roster <csv> --grades <csv> [--quiz <csv>]... [--weights <json>] [--out <dir>] [--report <netid>]';

/** Section and report names come from student data; keep them to one path segment. */
export function safeFileName(name: string): string {
  const cleaned = name.replace(/[\\/:*?"<>|\x00-\x1f]/g, '_');
  return cleaned.startsWith('.') ? `_${cleaned.slice(1)}` : cleaned;
}

function readSource(filePath: string): SourceFile {
  return { file_name: path.basename(filePath), content: fs.readFileSync(filePath, 'utf-8') };
}

/** Returns the process exit code; output goes to `write`. */
export function runCli(argv: string[], write: (line: string) => void = (line) => process.stdout.write(`${line}\n`)): number {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        roster: { type: 'string' },
        grades: { type: 'string' },
        quiz: { type: 'string', multiple: true },
        weights: { type: 'string' },
        out: { type: 'string', default: 'out' },
        report: { type: 'string' },
      },
    });

    if (!values.roster || !values.grades) {
      throw new ValidationError(USAGE);
    }

    const weights = validateWeights(values.weights ? JSON.parse(fs.readFileSync(values.weights, 'utf-8')) : undefined);
    const { table } = runGradebook({
      roster: readSource(values.roster),
      grades: readSource(values.grades),
      quizzes: (values.quiz ?? []).map(readSource),
      weights,
    });

    const outDir = values.out ?? 'out';
    fs.mkdirSync(outDir, { recursive: true });
    fs.writeFileSync(path.join(outDir, FULL_EXPORT_FILE), generateCSV(table));
    for (const section of generateSectionCSVs(table)) {
      fs.writeFileSync(path.join(outDir, safeFileName(section.file_name)), section.csv);
    }

    if (values.report) {
      const report = studentReport(table, values.report);
      fs.writeFileSync(path.join(outDir, safeFileName(report.file_name)), report.text);
      write(report.text);
    }

    write(`Students: ${table.rows.size}`);
    for (const { grade, count } of gradeHistogram(table)) {
      write(`${grade}: ${count}`);
    }
    logger.info({ module: 'cli', out_dir: outDir, student_count: table.rows.size }, 'Exports written');
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ module: 'cli', error_detail: message }, 'Gradebook run failed');
    write(`Error: ${message}`);
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
