import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { CONFIG_DIR } from '../config';

export const DEFAULT_MAPPINGS: Record<string, string> = {
  a: 'add',
  d: 'delete',
  r: 'reset',
  c: 'commit',
  p: 'preview',
  P: 'patch',
};

const GitsiftConfigSchema = z.object({
  // Single keypress → action name, used by the interactive picker.
  mappings: z
    .record(z.string().length(1), z.string().min(1))
    .default(DEFAULT_MAPPINGS),
  log: z
    .object({
      maxCount: z.number().int().positive().default(200),
    })
    .default({}),
  // Executable that receives the file path, e.g. "trash". Files are deleted outright when unset.
  removeCommand: z.string().min(1).optional(),
});

export type GitsiftConfig = z.infer<typeof GitsiftConfigSchema>;

const CONFIG_FILE = 'config.json';

export function getConfigPath(): string {
  return path.join(CONFIG_DIR, CONFIG_FILE);
}

export function defaults(): GitsiftConfig {
  return GitsiftConfigSchema.parse({});
}

export async function load(): Promise<GitsiftConfig> {
  const configPath = getConfigPath();
  let raw: string;

  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return defaults();
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`Config file is malformed: ${configPath} is not valid JSON.`);
  }

  const result = GitsiftConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'root';
    throw new Error(`Config file is invalid at "${where}": ${issue.message}`);
  }

  return result.data;
}

export async function save(config: GitsiftConfig): Promise<void> {
  await fs.mkdir(CONFIG_DIR, { recursive: true });
  await fs.writeFile(getConfigPath(), JSON.stringify(config, null, 2), 'utf-8');
}
