import type { Arch, Phase, PlatformName } from './platforms'

/**
 * Everything that steers a build.
 * Built once at startup and handed to every step.
 */
export interface BoostConfig {
  version: string

  /** Compiled libraries, passed to `bootstrap.sh` and `bcp`. */
  libs: string[]

  /** Header-only modules and files that `bcp` should also copy. */
  headers: string[]

  /** Uses `{version}` and `{underscored}` placeholders. */
  tarballUrlTemplate: string

  compiler: string
  cppStd: string
  stdLib: string
  iosMinVersion: string
  osxMinVersion: string

  /** Parallel jobs for b2. */
  jobs: number

  /** Build order. */
  platforms: PlatformName[]
  phases: Record<PlatformName, Phase[]>
  archs: Record<PlatformName, Arch[]>

  /** Echo every line of tool output to the console. */
  verbose: boolean
}

export const defaultConfig: BoostConfig = {
  version: '1.60.0',
  libs: ['chrono', 'thread', 'system'],
  headers: [
    'algorithm',
    'any',
    'exception',
    'iostreams',
    'optional',
    'typeof',
    'variant',
    'boost/circular_buffer.hpp',
    'boost/container/flat_map.hpp',
    'boost/container/flat_set.hpp',
    'boost/scope_exit.hpp',
    'boost/uuid/sha1.hpp'
  ],
  tarballUrlTemplate:
    'http://sourceforge.net/projects/boost/files/boost/{version}/boost_{underscored}.tar.bz2/download',

  compiler: 'clang++',
  cppStd: 'c++14',
  stdLib: 'libc++',
  iosMinVersion: '8.0',
  osxMinVersion: '10.9',

  jobs: 16,

  platforms: ['ios', 'simulator', 'osx'],
  phases: {
    ios: ['stage', 'install'],
    simulator: ['stage'],
    osx: ['stage']
  },
  archs: {
    ios: ['armv7', 'arm64'],
    simulator: ['i386', 'x86_64'],
    osx: ['i386', 'x86_64']
  },

  verbose: false
}
