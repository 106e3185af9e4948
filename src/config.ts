import fs from 'fs/promises';
import path from 'path';
import { DEFAULT_LABEL_TEXTS } from './labelLayout.js';
import { LabelTexts } from './types.js';

export interface AppConfig {
  inputDir: string;
  outputDir: string;
  port: number;
  texts: LabelTexts;
  rasterDensity: number;
  uiDir: string;
}

type Env = Record<string, string | undefined>;

const DOTENV_ENTRY = /^\s*([A-Za-z_][\w.-]*)\s*=\s*(.*?)\s*$/;

function unquote(value: string): string {
  const quoted = /^(["'])(.*)\1$/.exec(value);
  return quoted ? quoted[2] : value;
}

export function parseDotEnv(content: string): Record<string, string> {
  const entries = content
    .split(/\r?\n/)
    .filter(line => !line.trimStart().startsWith('#'))
    .map(line => DOTENV_ENTRY.exec(line))
    .filter((match): match is RegExpExecArray => match !== null)
    .map(([, key, value]) => [key, unquote(value)] as const);
  return Object.fromEntries(entries);
}

/** Copies `.env` entries into `env` without overriding what is already set. */
export async function loadDotEnv(envPath = path.join(process.cwd(), '.env'), env: Env = process.env): Promise<number> {
  let content: string;
  try {
    content = await fs.readFile(envPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return 0;
    }
    throw error;
  }

  let applied = 0;
  for (const [key, value] of Object.entries(parseDotEnv(content))) {
    if (!env[key]) {
      env[key] = value;
      applied += 1;
    }
  }
  return applied;
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const value = Number.parseInt(raw ?? '', 10);
  return Number.isNaN(value) || value <= 0 ? fallback : value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    inputDir: path.resolve(env.LABEL_INPUT_DIR || 'input'),
    outputDir: path.resolve(env.LABEL_OUTPUT_DIR || 'output'),
    port: positiveInt(env.PORT, 5000),
    texts: {
      ...DEFAULT_LABEL_TEXTS,
      headerTitle: env.LABEL_HEADER_TEXT || DEFAULT_LABEL_TEXTS.headerTitle,
      instruction: env.LABEL_INSTRUCTION_TEXT || DEFAULT_LABEL_TEXTS.instruction
    },
    rasterDensity: positiveInt(env.LABEL_BARCODE_DPI, 600),
    uiDir: path.resolve(env.LABEL_UI_DIR || 'ui')
  };
}
