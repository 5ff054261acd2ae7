import { copyFile, mkdir, rm } from 'node:fs/promises'
import { basename, join } from 'node:path'

import { asString, type Cleaner } from 'cleaners'

import {
  dirExists,
  fileExists,
  listFiles,
  MissingFileError
} from '../utils/common'
import type { BuildEnv } from '../utils/environment'
import type { Arch, Platform, PlatformFamily, Sdk } from '../utils/platforms'
import type { Build } from '../utils/tasks'
import { makePlatformBuild } from './platformBuild'
import type { BoostSource } from './source'

/** The combined archive we produce for each architecture and family. */
export const libraryName = 'libboost.a'

/**
 * What to do when a packaging input isn't there.
 * `optional` inputs are logged and skipped,
 * while `required` ones stop the build.
 */
export type InputPolicy = 'required' | 'optional'

export interface PackagePolicy {
  /** A platform's `stage/lib` directory. */
  stageDir: InputPolicy

  /** A library that some other platform built, but this one didn't. */
  archive: InputPolicy

  /** An architecture missing from a library. */
  slice: InputPolicy

  /** An architecture with no combined archive at merge time. */
  archLibrary: InputPolicy
}

export const defaultPackagePolicy: PackagePolicy = {
  stageDir: 'required',
  archive: 'optional',
  slice: 'optional',
  archLibrary: 'optional'
}

/**
 * Cleans the output of `lipo -archs`.
 */
export const asArchList: Cleaner<string[]> = raw =>
  asString(raw)
    .split(/\s+/)
    .filter(arch => arch !== '')

export function packagePath(env: BuildEnv, family?: PlatformFamily): string {
  const libPath = join(env.buildPath, 'lib')
  return family == null ? libPath : join(libPath, family)
}

export function stageLibPath(source: BoostSource, platform: Platform): string {
  return join(source.rootPath, makePlatformBuild(platform).stageDir, 'lib')
}

function handleMissing(
  build: Build,
  policy: InputPolicy,
  path: string,
  what: string
): void {
  if (policy === 'required') throw new MissingFileError(path, what)
  build.log(`Skipping missing ${what}: ${path}`)
}

/**
 * Lists every static library any platform produced.
 */
export async function collectArchives(
  build: Build,
  source: BoostSource,
  platforms: readonly Platform[],
  policy: InputPolicy = defaultPackagePolicy.stageDir
): Promise<string[]> {
  const names = new Set<string>()
  for (const platform of platforms) {
    const libPath = stageLibPath(source, platform)
    if (!(await dirExists(libPath))) {
      handleMissing(build, policy, libPath, 'stage directory')
      continue
    }
    for (const name of await listFiles(libPath)) names.add(name)
  }
  return [...names].sort()
}

export async function readArchs(
  build: Build,
  sdk: Sdk,
  archivePath: string
): Promise<string[]> {
  const output = await build.exec(
    'xcrun',
    ['--sdk', sdk, 'lipo', '-archs', archivePath],
    { capture: true }
  )
  return asArchList(output)
}

export interface SliceOptions {
  sdk: Sdk
  arch: Arch
  inPath: string
  outPath: string
  policy?: InputPolicy
}

/**
 * Pulls one architecture out of a library.
 * Returns false if the architecture isn't there.
 */
export async function extractSlice(
  build: Build,
  opts: SliceOptions
): Promise<boolean> {
  const { sdk, arch, inPath, outPath, policy = defaultPackagePolicy.slice } =
    opts

  const archs = await readArchs(build, sdk, inPath)
  if (!archs.includes(arch)) {
    handleMissing(build, policy, `${inPath} (${arch})`, 'architecture')
    return false
  }

  await mkdir(join(outPath, '..'), { recursive: true })
  if (archs.length === 1) {
    // lipo refuses to thin a library that isn't fat:
    await copyFile(inPath, outPath)
  } else {
    await build.exec('xcrun', [
      '--sdk',
      sdk,
      'lipo',
      inPath,
      '-thin',
      arch,
      '-o',
      outPath
    ])
  }
  return true
}

/**
 * Unpacks a single-architecture library into an `obj` directory beside it.
 */
export async function decomposeArchive(
  build: Build,
  archivePath: string
): Promise<void> {
  const objPath = join(archivePath, '../obj')
  await mkdir(objPath, { recursive: true })
  await build.inDir(objPath, async () => {
    await build.exec('ar', ['-x', `../${basename(archivePath)}`])
  })
}

/**
 * Bundles every object file in `<archPath>/obj` into one library.
 * Returns false if there is nothing to bundle.
 */
export async function assembleArchive(
  build: Build,
  sdk: Sdk,
  archPath: string
): Promise<boolean> {
  const objPath = join(archPath, 'obj')
  const objects = (await dirExists(objPath))
    ? await listFiles(objPath, name => name.endsWith('.o'))
    : []
  if (objects.length === 0) {
    build.log(`No object files in ${objPath}`)
    return false
  }

  await rm(join(archPath, libraryName), { force: true })
  await build.inDir(archPath, async () => {
    await build.exec('xcrun', [
      '--sdk',
      sdk,
      'ar',
      'crus',
      libraryName,
      ...objects.map(object => join('obj', object))
    ])
  })
  return true
}

/**
 * Merges per-architecture libraries into one fat library.
 * Returns the path to the result, or undefined if there was nothing to merge.
 */
export async function mergeFatArchive(
  build: Build,
  familyPath: string,
  archs: readonly Arch[],
  policy: InputPolicy = defaultPackagePolicy.archLibrary
): Promise<string | undefined> {
  const inputs: string[] = []
  for (const arch of archs) {
    const input = join(arch, libraryName)
    if (await fileExists(join(familyPath, input))) inputs.push(input)
    else handleMissing(build, policy, join(familyPath, input), 'library')
  }
  if (inputs.length === 0) return

  await rm(join(familyPath, libraryName), { force: true })
  await build.inDir(familyPath, async () => {
    await build.exec('lipo', ['-create', ...inputs, '-output', libraryName])
  })
  return join(familyPath, libraryName)
}

export interface PackageOptions {
  env: BuildEnv
  source: BoostSource
  platforms: readonly Platform[]
  policy?: PackagePolicy
}

/**
 * Turns each platform's staged libraries into one fat `libboost.a`
 * per platform family, and installs those in the output directory.
 */
export async function packageBoost(
  build: Build,
  opts: PackageOptions
): Promise<string[]> {
  const { env, source, platforms, policy = defaultPackagePolicy } = opts

  // Start from a clean slate:
  await rm(packagePath(env), { recursive: true, force: true })

  // Split every library into per-architecture object files:
  const archives = await collectArchives(
    build,
    source,
    platforms,
    policy.stageDir
  )
  for (const platform of platforms) {
    const familyPath = packagePath(env, platform.family)
    const libPath = stageLibPath(source, platform)
    for (const archive of archives) {
      const inPath = join(libPath, archive)
      if (!(await fileExists(inPath))) {
        handleMissing(build, policy.archive, inPath, 'library')
        continue
      }

      for (const arch of platform.archs) {
        const outPath = join(familyPath, arch, archive)
        const found = await extractSlice(build, {
          sdk: platform.toolSdk,
          arch,
          inPath,
          outPath,
          policy: policy.slice
        })
        if (found) await decomposeArchive(build, outPath)
      }
    }
  }

  // Combine the object files for each architecture:
  const families = new Map<PlatformFamily, { sdk: Sdk; archs: Arch[] }>()
  for (const platform of platforms) {
    const family = families.get(platform.family) ?? {
      sdk: platform.toolSdk,
      archs: []
    }
    for (const arch of platform.archs) {
      if (!family.archs.includes(arch)) family.archs.push(arch)
    }
    families.set(platform.family, family)
  }
  for (const [name, family] of families) {
    console.log(`Combining ${name} libraries for ${family.archs.join(', ')}`)
    for (const arch of family.archs) {
      const archPath = join(packagePath(env, name), arch)
      await assembleArchive(build, family.sdk, archPath)
    }
  }

  // Merge and install the fat libraries:
  const installed: string[] = []
  for (const [name, family] of families) {
    const fatPath = await mergeFatArchive(
      build,
      packagePath(env, name),
      family.archs,
      policy.archLibrary
    )
    if (fatPath == null) continue

    const installPath = join(env.outputLibPath, name, libraryName)
    console.log(`Installing ${installPath}`)
    await mkdir(join(env.outputLibPath, name), { recursive: true })
    await copyFile(fatPath, installPath)
    installed.push(installPath)
  }
  return installed
}
