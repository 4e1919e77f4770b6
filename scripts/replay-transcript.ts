#!/usr/bin/env node
/**
 * Replay Tool -- replays a JSON match transcript headlessly and writes a
 * JSON summary report.
 *
 * Usage:
 *   npx tsx scripts/replay-transcript.ts <transcript.json> [--output <report.json>]
 *
 * The tool:
 *   1. Validates the transcript file (exists, valid JSON, schema version 1)
 *   2. Rebuilds the match from its seed and decks and re-submits every intent
 *   3. Checks the replayed result against the recorded one
 *   4. Writes a replay report with a per-turn summary
 *
 * Exits with status 1 when the replay diverges from the recording.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { basename, dirname, extname, join, resolve } from 'path';
import { parseArgs } from 'util';
import { ZodError } from 'zod';
import { loadCatalogFile, loadDeckFile } from '../src/card-system';
import { createLogger, parseLogLevel } from '../src/core-engine';
import {
  parseTranscript,
  replayTranscript,
  summarizeTurns,
  type MatchTranscript,
  type TurnSummary,
} from '../src/rule-engine';

// ── Types ───────────────────────────────────────────────────

interface ReplayReport {
  transcriptPath: string;
  intentsReplayed: number;
  turns: TurnSummary[];
  recordedWinnerId: string | null;
  replayedWinnerId: string | null;
  matchesRecording: boolean;
  totalDurationMs: number;
}

const logger = createLogger({
  tag: 'Replay',
  level: parseLogLevel(process.env.LOG_LEVEL, 'info'),
});

// ── CLI Arg Parsing ─────────────────────────────────────────

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    output: { type: 'string', short: 'o' },
  },
});

const transcriptArg = positionals[0];
if (transcriptArg === undefined) {
  logger.error('No transcript file specified.');
  logger.error('Usage: npx tsx scripts/replay-transcript.ts <transcript.json> [--output <report.json>]');
  process.exit(1);
}

const transcriptPath = resolve(transcriptArg);
const outputPath = resolve(
  values.output ??
    join('data', 'reports', `${basename(transcriptPath, extname(transcriptPath))}-replay.json`),
);

// ── Transcript Validation ───────────────────────────────────

function loadTranscript(filePath: string): MatchTranscript {
  if (!existsSync(filePath)) {
    logger.error(`Transcript file not found: ${filePath}`);
    process.exit(1);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    logger.error(`Transcript file contains invalid JSON: ${String(err)}`);
    process.exit(1);
  }

  try {
    return parseTranscript(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      for (const issue of err.issues) {
        logger.error(`  ${issue.path.join('.') || '(root)'}: ${issue.message}`);
      }
      logger.error('Transcript does not match the expected format.');
      process.exit(1);
    }
    throw err;
  }
}

// ── Replay ──────────────────────────────────────────────────

const transcript = loadTranscript(transcriptPath);
const { catalog } = loadCatalogFile(undefined, logger);
const decks = loadDeckFile(catalog);

const started = Date.now();
const match = replayTranscript(transcript, catalog, decks, { logger });

const recordedWinnerId = transcript.result?.winnerId ?? null;
const report: ReplayReport = {
  transcriptPath,
  intentsReplayed: transcript.intents.length,
  turns: summarizeTurns(match.history),
  recordedWinnerId,
  replayedWinnerId: match.winnerId,
  matchesRecording:
    match.winnerId === recordedWinnerId &&
    (transcript.result === null || transcript.result.turnNumber === match.turnNumber),
  totalDurationMs: Date.now() - started,
};

mkdirSync(dirname(outputPath), { recursive: true });
writeFileSync(outputPath, JSON.stringify(report, null, 2) + '\n');

logger.info(`Replayed ${report.intentsReplayed} intents over ${report.turns.length} turns`);
logger.info(`Report written to ${outputPath}`);

if (!report.matchesRecording) {
  logger.error(
    `Replay diverged: recorded winner ${recordedWinnerId ?? 'none'}, replayed ${match.winnerId ?? 'none'}`,
  );
  process.exit(1);
}
