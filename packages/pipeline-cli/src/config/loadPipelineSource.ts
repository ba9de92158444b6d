import { access, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, resolve } from 'node:path'
import { pathToFileURL } from 'node:url'

import { ConfigError, loadPipelines, parsePipelineDocuments, type Pipeline } from '@relayci/pipeline-core'
import ts from 'typescript'

/**
 * File names looked up in the working directory, in priority order.
 */
export const PIPELINE_FILE_CANDIDATES = [
  'pipeline.yml',
  'pipeline.yaml',
  'pipeline.json',
  'pipeline.config.ts',
] as const

/**
 * Pipelines read from one file.
 */
export interface LoadedPipelineSource {
  /** Pipelines in document order. */
  readonly pipelines: readonly Pipeline[]
  /** Absolute path of the file they were read from. */
  readonly sourcePath: string
}

/**
 * Finds and loads the pipeline file.
 *
 * YAML and JSON files are handed to the document loader as text. A
 * `.ts` file is transpiled and must export a pipeline document (or a list
 * of documents) as its default export or as `pipeline`.
 *
 * @param cwd Base working directory.
 * @param configPath Optional explicit file path, relative to `cwd`.
 * @returns Loaded pipelines with the resolved file path.
 * @throws ConfigError when no file is found or its content is invalid.
 */
export const loadPipelineSource = async (
  cwd: string,
  configPath?: string
): Promise<LoadedPipelineSource> => {
  const sourcePath = await resolvePipelineSourcePath(cwd, configPath)
  if (!sourcePath) {
    throw new ConfigError(
      `No pipeline file found. Expected one of: ${PIPELINE_FILE_CANDIDATES.join(', ')}`
    )
  }

  if (/\.(?:yml|yaml|json)$/u.test(sourcePath)) {
    const text = await readSourceText(sourcePath)
    return { pipelines: loadPipelines(text), sourcePath }
  }

  if (/\.(?:ts|mts)$/u.test(sourcePath)) {
    const exported = await loadTypeScriptModule(sourcePath)
    const documents: readonly unknown[] = Array.isArray(exported) ? exported : [exported]
    return { pipelines: parsePipelineDocuments(documents), sourcePath }
  }

  throw new ConfigError(`Unsupported pipeline file extension: ${sourcePath}`)
}

const resolvePipelineSourcePath = async (
  cwd: string,
  configPath?: string
): Promise<string | null> => {
  if (configPath) {
    return resolve(cwd, configPath)
  }

  for (const candidate of PIPELINE_FILE_CANDIDATES) {
    const candidatePath = resolve(cwd, candidate)
    if (await fileExists(candidatePath)) {
      return candidatePath
    }
  }

  return null
}

const fileExists = async (path: string): Promise<boolean> => {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

const readSourceText = async (sourcePath: string): Promise<string> => {
  try {
    return await readFile(sourcePath, 'utf8')
  } catch (error) {
    throw new ConfigError(`Cannot read pipeline file ${sourcePath}`, undefined, { cause: error })
  }
}

const loadTypeScriptModule = async (sourcePath: string): Promise<unknown> => {
  const source = await readSourceText(sourcePath)
  const transpiled = ts.transpileModule(source, {
    compilerOptions: {
      module: ts.ModuleKind.ESNext,
      target: ts.ScriptTarget.ES2022,
      esModuleInterop: true,
    },
    fileName: sourcePath,
    reportDiagnostics: true,
  })

  if (transpiled.diagnostics && transpiled.diagnostics.length > 0) {
    const message = ts.formatDiagnosticsWithColorAndContext(transpiled.diagnostics, {
      getCurrentDirectory: (): string => dirname(sourcePath),
      getCanonicalFileName: (fileName: string): string => fileName,
      getNewLine: (): string => '\n',
    })
    throw new ConfigError(`Failed to transpile ${sourcePath}\n${message}`)
  }

  const tempDirectory = await mkdtemp(resolve(tmpdir(), 'relayci-pipeline-'))
  const tempFilePath = resolve(tempDirectory, 'pipeline.mjs')

  try {
    await writeFile(tempFilePath, transpiled.outputText, 'utf8')
    const moduleUrl = `${pathToFileURL(tempFilePath).href}?v=${Date.now()}`
    const loadedModule: unknown = await import(moduleUrl)

    if (isRecord(loadedModule) && loadedModule.default !== undefined) {
      return unwrapNestedDefault(loadedModule.default)
    }

    if (isRecord(loadedModule) && loadedModule.pipeline !== undefined) {
      return loadedModule.pipeline
    }

    throw new ConfigError(`Pipeline module ${sourcePath} must export default or named "pipeline"`)
  } finally {
    await rm(tempDirectory, { recursive: true, force: true })
  }
}

const unwrapNestedDefault = (value: unknown): unknown => {
  if (isRecord(value) && 'default' in value) {
    return value.default
  }

  return value
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
