import { rm } from 'node:fs/promises'
import { join } from 'node:path'

import { asString, type Cleaner } from 'cleaners'

import { quietExec } from './common'
import { sdkPath } from './platforms'

/**
 * Where things go, and which developer tools we found.
 */
export interface BuildEnv {
  /** The project directory. Final outputs go here. */
  rootPath: string

  /** Scratch space, removed after a successful build. */
  buildPath: string

  /** The active Xcode developer directory. */
  xcodeRoot: string
  iosSdkVersion: string
  osxSdkVersion: string
  simulatorSdkPath: string

  outputLibPath: string
  outputIncludePath: string
}

export interface ProbeResults {
  xcodeRoot: string
  iosSdkVersion: string
  osxSdkVersion: string
}

export type Prober = (
  command: string,
  args: readonly string[]
) => Promise<string>

export const asSdkVersion: Cleaner<string> = raw => {
  const version = asString(raw).trim()
  if (!/^\d+(\.\d+)*$/.test(version)) {
    throw new TypeError(`Expected an SDK version, got "${version}"`)
  }
  return version
}

export const asToolchainPath: Cleaner<string> = raw => {
  const path = asString(raw).trim()
  if (!path.startsWith('/')) {
    throw new TypeError(`Expected an absolute path, got "${path}"`)
  }
  return path
}

export function makeBuildEnv(rootPath: string, probe: ProbeResults): BuildEnv {
  const { xcodeRoot, iosSdkVersion, osxSdkVersion } = probe
  return {
    rootPath,
    buildPath: join(rootPath, 'build'),
    xcodeRoot,
    iosSdkVersion,
    osxSdkVersion,
    simulatorSdkPath: sdkPath(xcodeRoot, 'iPhoneSimulator', iosSdkVersion),
    outputLibPath: join(rootPath, 'lib'),
    outputIncludePath: join(rootPath, 'include/boost')
  }
}

/**
 * Asks Xcode where it lives and which SDKs it has.
 */
export async function probeBuildEnv(
  rootPath: string,
  prober: Prober = quietExec
): Promise<BuildEnv> {
  async function probe(
    what: string,
    asResult: Cleaner<string>,
    command: string,
    args: readonly string[]
  ): Promise<string> {
    try {
      return asResult(await prober(command, args))
    } catch (error: unknown) {
      throw new Error(`Cannot determine the ${what}: ${String(error)}`)
    }
  }

  return makeBuildEnv(rootPath, {
    xcodeRoot: await probe('Xcode path', asToolchainPath, 'xcode-select', [
      '-print-path'
    ]),
    iosSdkVersion: await probe('iOS SDK version', asSdkVersion, 'xcrun', [
      '-sdk',
      'iphoneos',
      '--show-sdk-version'
    ]),
    osxSdkVersion: await probe('macOS SDK version', asSdkVersion, 'xcrun', [
      '-sdk',
      'macosx',
      '--show-sdk-version'
    ])
  })
}

/**
 * Removes the scratch directory, leaving only the final outputs.
 */
export async function cleanup(env: BuildEnv): Promise<void> {
  console.log(`Cleaning up ${env.buildPath}`)
  await rm(env.buildPath, { recursive: true, force: true })
}
