import { cp, mkdir, rm } from 'node:fs/promises'
import { join } from 'node:path'

import { fileExists, lsr, MissingFileError } from '../utils/common'
import type { BoostConfig } from '../utils/config'
import type { BuildEnv } from '../utils/environment'
import type { Build } from '../utils/tasks'
import type { BoostSource } from './source'

export function bcpPath(source: BoostSource): string {
  return join(source.rootPath, 'dist/bin/bcp')
}

/**
 * Builds Boost's `bcp` tool, unless we already have it.
 */
export async function ensureBcp(
  build: Build,
  source: BoostSource
): Promise<string> {
  const path = bcpPath(source)
  if (await fileExists(path)) {
    console.log(`Found bcp: ${path}`)
    return path
  }

  console.log('Building bcp')
  await build.inDir(source.rootPath, async () => {
    await build.exec('./b2', ['tools/bcp'])
  })
  if (!(await fileExists(path))) throw new MissingFileError(path, 'bcp')
  return path
}

/**
 * Copies just the headers we need into `build/src`.
 */
export async function extractHeaders(
  build: Build,
  env: BuildEnv,
  source: BoostSource,
  config: Pick<BoostConfig, 'libs' | 'headers'>
): Promise<string> {
  const bcp = await ensureBcp(build, source)
  const outPath = join(env.buildPath, 'src')
  await mkdir(outPath, { recursive: true })

  const modules = [...config.libs, ...config.headers]
  console.log(`Extracting ${modules.join(', ')}`)
  await build.inDir(source.rootPath, async () => {
    await build.exec(bcp, [...modules, outPath])
  })
  return outPath
}

/**
 * Replaces the installed header tree with a freshly-extracted one.
 */
export async function installHeaders(
  build: Build,
  env: BuildEnv,
  srcPath: string
): Promise<void> {
  const fromPath = join(srcPath, 'boost')
  await rm(env.outputIncludePath, { recursive: true, force: true })
  await cp(fromPath, env.outputIncludePath, { recursive: true })

  let count = 0
  for await (const path of lsr(env.outputIncludePath)) {
    build.log(path)
    ++count
  }
  console.log(`Installed ${count} headers in ${env.outputIncludePath}`)
}
