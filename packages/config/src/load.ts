import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import { ConfigurationError, configSchema, type Config } from '@fairness-check/shared'
import { readEnv, type FairnessCheckEnv } from './env'

export interface ParseConfigOptions {
  /** Name shown in error messages, usually the file path. */
  source?: string
  /** Directory a relative dataset path is resolved against. */
  baseDir?: string
  env?: FairnessCheckEnv
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** Parse and validate a YAML configuration document. */
export function parseConfig(text: string, options: ParseConfigOptions = {}): Config {
  const source = options.source ?? '<config>'

  let data: unknown
  try {
    data = parseYaml(text)
  } catch (err) {
    throw new ConfigurationError(`Invalid configuration: ${messageOf(err)}`, source, [], { cause: err })
  }
  if (data === null || data === undefined) {
    throw new ConfigurationError('Invalid configuration: file is empty', source)
  }

  const result = configSchema.safeParse(data)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, source, issues)
  }

  const config = result.data
  const authToken = config.endpoint.auth_token ?? options.env?.authToken
  const datasetPath =
    options.baseDir && !path.isAbsolute(config.dataset.path)
      ? path.resolve(options.baseDir, config.dataset.path)
      : config.dataset.path

  return {
    ...config,
    endpoint: { ...config.endpoint, auth_token: authToken },
    dataset: { ...config.dataset, path: datasetPath },
  }
}

/**
 * Load a configuration file.
 *
 * @throws ConfigurationError if the file is missing, not YAML, or invalid
 */
export async function loadConfig(configPath: string, env: FairnessCheckEnv = readEnv()): Promise<Config> {
  let text: string
  try {
    text = await readFile(configPath, 'utf8')
  } catch (err) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT'
    throw new ConfigurationError(
      missing
        ? `Configuration file not found: ${configPath}`
        : `Cannot read configuration file ${configPath}: ${messageOf(err)}`,
      configPath,
      [],
      { cause: err },
    )
  }

  return parseConfig(text, { source: configPath, baseDir: path.dirname(path.resolve(configPath)), env })
}
