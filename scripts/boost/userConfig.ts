import { appendFile, copyFile } from 'node:fs/promises'
import { join } from 'node:path'

import { fileExists, MissingFileError } from '../utils/common'
import type { BoostConfig } from '../utils/config'
import type { BuildEnv } from '../utils/environment'
import type { Arch, Platform } from '../utils/platforms'
import type { Build } from '../utils/tasks'
import type { BoostSource } from './source'

/** The stock file we append our toolsets to. */
export const userConfigTemplate = 'tools/build/example/user-config.jam'

/**
 * One `using darwin` block in user-config.jam.
 */
export interface ToolsetStanza {
  /** Such as `9.3~iphone`, selected by `toolset=darwin-9.3~iphone` */
  version: string
  compiler: string
  archs: readonly Arch[]
  sysroot: string
  platformPath: string
  architecture: 'arm' | 'x86'
  targetOs: 'iphone' | 'darwin'
}

export function makeStanza(
  platform: Platform,
  env: BuildEnv,
  config: Pick<BoostConfig, 'compiler'>
): ToolsetStanza {
  return {
    version: platform.toolsetVersion,
    compiler: `${env.xcodeRoot}/Toolchains/XcodeDefault.xctoolchain/usr/bin/${config.compiler}`,
    archs: platform.archs,
    sysroot: platform.sysroot,
    platformPath: platform.platformPath,
    architecture: platform.architecture,
    targetOs: platform.targetOs
  }
}

export function renderStanza(stanza: ToolsetStanza): string {
  const command = [
    stanza.compiler,
    ...stanza.archs.map(arch => `-arch ${arch}`),
    `"-isysroot ${stanza.sysroot}"`,
    `-I${stanza.sysroot}/usr/include`
  ].join(' ')

  return (
    `using darwin : ${stanza.version}\n` +
    `: ${command}\n` +
    `: <striper> <root>${stanza.platformPath}\n` +
    `: <architecture>${stanza.architecture} <target-os>${stanza.targetOs}\n` +
    ';\n'
  )
}

export function renderUserConfig(stanzas: readonly ToolsetStanza[]): string {
  return '\n' + stanzas.map(renderStanza).join('')
}

/**
 * Writes user-config.jam, unless a previous run already did.
 */
export async function createUserConfig(
  build: Build,
  source: BoostSource,
  platforms: readonly Platform[],
  env: BuildEnv,
  config: Pick<BoostConfig, 'compiler'>
): Promise<void> {
  if (await fileExists(source.configPath)) {
    console.log(`Found b2 configuration: ${source.configPath}`)
    return
  }

  const templatePath = join(source.rootPath, userConfigTemplate)
  if (!(await fileExists(templatePath))) {
    throw new MissingFileError(templatePath)
  }

  const text = renderUserConfig(
    platforms.map(platform => makeStanza(platform, env, config))
  )
  build.log(text)
  await copyFile(templatePath, source.configPath)
  await appendFile(source.configPath, text, 'utf8')
}
