import { join } from 'node:path'

import type { BoostConfig } from '../utils/config'
import type { Phase, Platform } from '../utils/platforms'
import type { Build } from '../utils/tasks'
import type { BoostSource } from './source'

/**
 * One b2 run, for a single platform and phase.
 * Directories are relative to the Boost source tree.
 */
export interface PlatformBuild {
  platform: Platform
  phase: Phase
  buildDir: string
  stageDir: string
  prefixDir: string
}

export function makePlatformBuild(
  platform: Platform,
  phase: Phase = 'stage'
): PlatformBuild {
  const buildDir = `${platform.name}-build`
  return {
    platform,
    phase,
    buildDir,
    stageDir: join(buildDir, 'stage'),
    prefixDir: join(buildDir, 'prefix')
  }
}

export function cxxFlags(
  platform: Platform,
  config: Pick<
    BoostConfig,
    'cppStd' | 'stdLib' | 'iosMinVersion' | 'osxMinVersion'
  >
): string[] {
  const flags = [
    `-std=${config.cppStd}`,
    `-stdlib=${config.stdLib}`,
    '-fvisibility=hidden',
    '-fvisibility-inlines-hidden',
    '-fPIC',
    '-DBOOST_SP_USE_SPINLOCK'
  ]

  if (platform.targetOs === 'iphone') {
    flags.push(`-miphoneos-version-min=${config.iosMinVersion}`)
    flags.push('-fembed-bitcode')
  } else {
    flags.push(`-mmacosx-version-min=${config.osxMinVersion}`)
  }
  return flags
}

/**
 * The b2 command line for a platform build.
 * These go straight to the process, so nothing is quoted.
 */
export function buildArgs(
  task: PlatformBuild,
  source: BoostSource,
  config: BoostConfig
): string[] {
  const { platform } = task
  const args = [
    `-j${config.jobs}`,
    `--build-dir=${task.buildDir}`,
    `--stagedir=${task.stageDir}`,
    `--prefix=${task.prefixDir}`,
    `linkflags=-stdlib=${config.stdLib}`,
    'link=static',
    'variant=release',
    `-sBOOST_BUILD_USER_CONFIG=${source.configPath}`,
    `target-os=${platform.targetOs}`,
    `macosx-version=${platform.macosxVersion}`,
    `toolset=darwin-${platform.toolsetVersion}`
  ]

  if (platform.name === 'ios') args.push('define=_LITTLE_ENDIAN')

  args.push(`architecture=${platform.architecture}`)
  args.push(`cxxflags=${cxxFlags(platform, config).join(' ')}`)
  args.push(task.phase)
  return args
}

export async function runPlatformBuild(
  build: Build,
  task: PlatformBuild,
  source: BoostSource,
  config: BoostConfig
): Promise<void> {
  console.log(`Running ${task.phase} target on ${task.platform.name}`)
  await build.inDir(source.rootPath, async () => {
    await build.exec('./b2', buildArgs(task, source, config))
  })
}
