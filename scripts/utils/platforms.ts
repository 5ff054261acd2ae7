import type { BoostConfig } from './config'
import type { BuildEnv } from './environment'

export type Arch = 'armv7' | 'arm64' | 'i386' | 'x86_64'
export type Phase = 'stage' | 'install'
export type PlatformName = 'ios' | 'simulator' | 'osx'

/** Platforms that share one fat library. */
export type PlatformFamily = 'ios' | 'osx'

export type Sdk = 'iphoneos' | 'iphonesimulator' | 'macosx'

/**
 * Everything we know about one Boost target.
 */
export interface Platform {
  name: PlatformName
  family: PlatformFamily
  archs: Arch[]

  /** The SDK we compile against. */
  sdk: Sdk

  /** The SDK whose tools we use for packaging. */
  toolSdk: Sdk

  sdkVersion: string

  /** Developer directory, such as `.../iPhoneOS.platform/Developer` */
  platformPath: string

  /** Where to find libraries and headers. */
  sysroot: string

  /** The version tag in our b2 toolset, such as `9.3~iphone` */
  toolsetVersion: string

  /** The b2 `macosx-version` feature. */
  macosxVersion: string

  /** The b2 `architecture` feature. */
  architecture: 'arm' | 'x86'

  /** The b2 `target-os` feature. */
  targetOs: 'iphone' | 'darwin'
}

const platformInfo = {
  ios: {
    family: 'ios',
    sdk: 'iphoneos',
    toolSdk: 'iphoneos',
    dirName: 'iPhoneOS',
    tag: 'iphone',
    architecture: 'arm',
    targetOs: 'iphone'
  },
  simulator: {
    family: 'ios',
    sdk: 'iphonesimulator',
    toolSdk: 'iphoneos',
    dirName: 'iPhoneSimulator',
    tag: 'iphonesim',
    architecture: 'x86',
    targetOs: 'iphone'
  },
  osx: {
    family: 'osx',
    sdk: 'macosx',
    toolSdk: 'macosx',
    dirName: 'MacOSX',
    tag: 'osx',
    architecture: 'x86',
    targetOs: 'darwin'
  }
} as const

export function platformPath(xcodeRoot: string, dirName: string): string {
  return `${xcodeRoot}/Platforms/${dirName}.platform/Developer`
}

export function sdkPath(
  xcodeRoot: string,
  dirName: string,
  version: string
): string {
  return `${platformPath(xcodeRoot, dirName)}/SDKs/${dirName}${version}.sdk`
}

export function makePlatform(
  name: PlatformName,
  env: BuildEnv,
  config: BoostConfig
): Platform {
  const info = platformInfo[name]
  const sdkVersion = name === 'osx' ? env.osxSdkVersion : env.iosSdkVersion

  return {
    name,
    family: info.family,
    archs: config.archs[name],
    sdk: info.sdk,
    toolSdk: info.toolSdk,
    sdkVersion,
    platformPath: platformPath(env.xcodeRoot, info.dirName),
    sysroot: sdkPath(env.xcodeRoot, info.dirName, sdkVersion),
    toolsetVersion: `${sdkVersion}~${info.tag}`,
    macosxVersion: name === 'osx' ? sdkVersion : `${info.tag}-${sdkVersion}`,
    architecture: info.architecture,
    targetOs: info.targetOs
  }
}

/**
 * Describes each platform we build, in build order.
 */
export function makePlatforms(env: BuildEnv, config: BoostConfig): Platform[] {
  return config.platforms.map(name => makePlatform(name, env, config))
}
