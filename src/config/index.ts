/**
 * @fileoverview Loads and validates application configuration from environment variables.
 * Defaults reproduce the fixed run parameters: approved drugs (phase 4) first approved in 2019 or later.
 * @module src/config/index
 */
import dotenv from 'dotenv';
import { z } from 'zod';

import { PipelineError, PipelineErrorCode } from '@/types-global/errors.js';

export const KEYWORD_SOURCES = [
  'keywords',
  'description',
  'go',
  'family',
] as const;

export type KeywordSource = (typeof KEYWORD_SOURCES)[number];

export const FAILURE_POLICIES = ['abort', 'skip'] as const;

export type FailurePolicy = (typeof FAILURE_POLICIES)[number];

const LOG_LEVELS = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'crit',
  'silent',
] as const;

const EnvSchema = z.object({
  CHEMBL_API_URL: z
    .string()
    .url()
    .default('https://www.ebi.ac.uk/chembl/api/data'),
  CHEMBL_PAGE_SIZE: z.coerce.number().int().min(1).max(1000).default(1000),
  UNIPROT_API_URL: z.string().url().default('https://rest.uniprot.org'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(200),
  MAX_PHASE: z.coerce.number().int().min(0).max(4).default(4),
  MIN_APPROVAL_YEAR: z.coerce.number().int().min(1900).default(2019),
  TARGET_FAILURE_POLICY: z.enum(FAILURE_POLICIES).default('abort'),
  KEYWORD_SOURCES: z
    .string()
    .default(KEYWORD_SOURCES.join(','))
    .transform((value) =>
      value
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean),
    )
    .pipe(z.array(z.enum(KEYWORD_SOURCES))),
  OUTPUT_DIR: z.string().min(1).default('.'),
  PROGRESS_INTERVAL: z.coerce.number().int().positive().default(25),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface AppConfigType {
  chembl: {
    baseUrl: string;
    pageSize: number;
  };
  uniprot: {
    baseUrl: string;
  };
  request: {
    timeoutMs: number;
    delayMs: number;
  };
  selection: {
    maxPhase: number;
    minApprovalYear: number;
  };
  targetFailurePolicy: FailurePolicy;
  keywordSources: KeywordSource[];
  outputDir: string;
  progressInterval: number;
  logLevel: (typeof LOG_LEVELS)[number];
}

/**
 * Validates an environment map and shapes it into {@link AppConfigType}.
 * Empty strings are treated as unset.
 *
 * @throws {PipelineError} `ConfigurationError` listing every invalid variable.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfigType {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new PipelineError(
      PipelineErrorCode.ConfigurationError,
      `Invalid configuration: ${issues.join('; ')}`,
      { issues },
    );
  }

  const e = parsed.data;
  return {
    chembl: {
      baseUrl: e.CHEMBL_API_URL.replace(/\/+$/, ''),
      pageSize: e.CHEMBL_PAGE_SIZE,
    },
    uniprot: { baseUrl: e.UNIPROT_API_URL.replace(/\/+$/, '') },
    request: {
      timeoutMs: e.REQUEST_TIMEOUT_MS,
      delayMs: e.REQUEST_DELAY_MS,
    },
    selection: {
      maxPhase: e.MAX_PHASE,
      minApprovalYear: e.MIN_APPROVAL_YEAR,
    },
    targetFailurePolicy: e.TARGET_FAILURE_POLICY,
    keywordSources: [...new Set(e.KEYWORD_SOURCES)],
    outputDir: e.OUTPUT_DIR,
    progressInterval: e.PROGRESS_INTERVAL,
    logLevel: e.LOG_LEVEL,
  };
}

/**
 * Reads `.env` (if present) into `process.env` and returns the validated configuration.
 */
export function loadConfig(): AppConfigType {
  dotenv.config();
  return parseConfig(process.env);
}
