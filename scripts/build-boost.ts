// Run this script as `node -r sucrase/register ./scripts/build-boost.ts`
//
// It will:
// - Download the Boost sources.
// - Build Boost for the iOS device, the iOS simulator, and macOS.
// - Assemble one fat static library for iOS and one for macOS, in lib/.
// - Copy the headers those libraries need into include/boost.
//
// Pass a task name, such as `boost.build`, to stop partway.
// Tool output lands in build/logs, which survives a failed build.
//

import { join } from 'path'

import { boost } from './libraries/boost'
import { defaultConfig } from './utils/config'
import { cleanup, probeBuildEnv } from './utils/environment'
import { makeTaskList, startBuild } from './utils/tasks'

async function main(): Promise<void> {
  const config = defaultConfig
  const taskName = process.argv[2] ?? 'default'

  // Set up build:
  const env = await probeBuildEnv(join(__dirname, '..'))
  const tasks = makeTaskList()
  boost(tasks, config, env)

  await startBuild(tasks, taskName, {
    basePath: env.buildPath,
    verbose: config.verbose
  })

  // Only the finished outputs should remain:
  if (taskName === 'default') await cleanup(env)
}

main().catch((error: unknown) => {
  console.log(String(error))
  process.exit(1)
})
