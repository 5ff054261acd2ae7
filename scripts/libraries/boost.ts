import { extractHeaders, installHeaders } from '../boost/headers'
import { packageBoost, type PackagePolicy } from '../boost/packager'
import { makePlatformBuild, runPlatformBuild } from '../boost/platformBuild'
import {
  bootstrap,
  ensureDownloaded,
  ensureUnpacked,
  makeBoostSource,
  patchMissingHeaders
} from '../boost/source'
import { createUserConfig } from '../boost/userConfig'
import type { BoostConfig } from '../utils/config'
import type { BuildEnv } from '../utils/environment'
import { makePlatforms } from '../utils/platforms'
import type { TaskList } from '../utils/tasks'

/**
 * Registers the Boost build steps:
 *
 * - boost.download, boost.unpack, boost.patch, boost.bootstrap, boost.config
 * - boost.build.<platform>.<phase>, rolled up into boost.build
 * - boost.package, boost.headers
 * - default, which does everything
 */
export function boost(
  tasks: TaskList,
  config: BoostConfig,
  env: BuildEnv,
  policy?: PackagePolicy
): void {
  const source = makeBoostSource(env, config)
  const platforms = makePlatforms(env, config)
  const { addTask } = tasks

  addTask('boost.download', async build => {
    await ensureDownloaded(build, source)
  })

  addTask('boost.unpack', async build => {
    await build.runTask('boost.download')
    await ensureUnpacked(build, source)
  })

  addTask('boost.patch', async build => {
    await build.runTask('boost.unpack')
    await patchMissingHeaders(build, env, source)
  })

  addTask('boost.bootstrap', async build => {
    await build.runTask('boost.patch')
    await bootstrap(build, source, config)
  })

  addTask('boost.config', async build => {
    await build.runTask('boost.bootstrap')
    await createUserConfig(build, source, platforms, env, config)
  })

  // Individual platform builds:
  const buildNames: string[] = []
  for (const platform of platforms) {
    for (const phase of config.phases[platform.name]) {
      const name = `boost.build.${platform.name}.${phase}`
      buildNames.push(name)
      addTask(name, async build => {
        await build.runTask('boost.config')
        const task = makePlatformBuild(platform, phase)
        await runPlatformBuild(build, task, source, config)
      })
    }
  }

  // One after the other, stopping at the first failure:
  addTask('boost.build', async build => {
    for (const name of buildNames) await build.runTask(name)
  })

  addTask('boost.package', async build => {
    await build.runTask('boost.build')
    await packageBoost(build, { env, source, platforms, policy })
  })

  addTask('boost.headers', async build => {
    await build.runTask('boost.bootstrap')
    const srcPath = await extractHeaders(build, env, source, config)
    await installHeaders(build, env, srcPath)
  })

  addTask('default', async build => {
    await build.runTask('boost.package')
    await build.runTask('boost.headers')
  })
}
