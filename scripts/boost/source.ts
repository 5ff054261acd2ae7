import { copyFile } from 'node:fs/promises'
import { join } from 'node:path'

import { dirExists, fileExists, MissingFileError } from '../utils/common'
import type { BoostConfig } from '../utils/config'
import type { BuildEnv } from '../utils/environment'
import type { Build } from '../utils/tasks'

/**
 * These are missing from the device SDK, but the simulator has them.
 * The device supports them, so we borrow the simulator's copies.
 */
export const missingHeaders = ['crt_externs.h', 'bzlib.h']

/**
 * Locations derived from a Boost version.
 */
export interface BoostSource {
  version: string

  /** The version with underscores, such as `1_60_0` */
  underVersion: string

  /** The unpacked source tree. */
  rootPath: string

  tarballPath: string
  tarballUrl: string

  /** Our generated b2 toolchain configuration. */
  configPath: string
}

export function makeBoostSource(
  env: BuildEnv,
  config: Pick<BoostConfig, 'version' | 'tarballUrlTemplate'>
): BoostSource {
  const { version, tarballUrlTemplate } = config
  const underVersion = version.replace(/[.]/g, '_')
  const rootPath = join(env.buildPath, `boost_${underVersion}`)

  return {
    version,
    underVersion,
    rootPath,
    tarballPath: join(env.buildPath, `boost_${underVersion}.tar.bz2`),
    tarballUrl: tarballUrlTemplate
      .replace(/\{version\}/g, version)
      .replace(/\{underscored\}/g, underVersion),
    configPath: join(rootPath, 'user-config.jam')
  }
}

export async function ensureDownloaded(
  build: Build,
  source: BoostSource
): Promise<void> {
  const { version, tarballPath, tarballUrl } = source
  if (await fileExists(tarballPath)) {
    console.log(`Found Boost ${version} tarball: ${tarballPath}`)
    return
  }

  console.log(`Downloading Boost ${version} tarball: ${tarballPath}`)
  await build.exec('curl', ['-L', '-o', tarballPath, tarballUrl])
}

export async function ensureUnpacked(
  build: Build,
  source: BoostSource
): Promise<void> {
  const { version, rootPath, tarballPath } = source
  if (await dirExists(rootPath)) {
    console.log(`Found Boost ${version} source: ${rootPath}`)
    return
  }
  if (!(await fileExists(tarballPath))) {
    throw new MissingFileError(tarballPath, `Boost ${version} tarball`)
  }

  console.log(`Unpacking Boost ${version} tarball in ${build.basePath}`)
  await build.inDir(build.basePath, async () => {
    await build.exec('tar', ['xfj', tarballPath])
  })
}

export async function patchMissingHeaders(
  build: Build,
  env: BuildEnv,
  source: BoostSource
): Promise<void> {
  const includePath = join(env.simulatorSdkPath, 'usr/include')
  for (const filename of missingHeaders) {
    const filePath = join(includePath, filename)
    if (!(await fileExists(filePath))) throw new MissingFileError(filePath)

    const destPath = join(source.rootPath, filename)
    if (await fileExists(destPath)) continue
    console.log(`Copying ${filename}`)
    build.log(`cp ${filePath} ${destPath}`)
    await copyFile(filePath, destPath)
  }
}

export async function bootstrap(
  build: Build,
  source: BoostSource,
  config: Pick<BoostConfig, 'libs'>
): Promise<void> {
  console.log(
    `Bootstrapping Boost ${source.version} with ${config.libs.join(', ')}`
  )
  await build.inDir(source.rootPath, async () => {
    await build.exec('./bootstrap.sh', [
      `--with-libraries=${config.libs.join(',')}`
    ])
  })
}
