import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import {
  failureReason,
  makeFakeToolbox,
  makeTestEnv,
  runInBuild
} from '../../__tests__/fakeTools'
import { MissingFileError } from '../../utils/common'
import { defaultConfig } from '../../utils/config'
import { type BuildEnv, makeBuildEnv } from '../../utils/environment'
import {
  bootstrap,
  ensureDownloaded,
  ensureUnpacked,
  makeBoostSource,
  patchMissingHeaders
} from '../source'

describe('makeBoostSource', () => {
  it('derives names from the version', () => {
    const env = makeBuildEnv('/work', {
      xcodeRoot: '/X',
      iosSdkVersion: '9.3',
      osxSdkVersion: '10.11'
    })
    expect(makeBoostSource(env, defaultConfig)).toEqual({
      version: '1.60.0',
      underVersion: '1_60_0',
      rootPath: '/work/build/boost_1_60_0',
      tarballPath: '/work/build/boost_1_60_0.tar.bz2',
      tarballUrl:
        'http://sourceforge.net/projects/boost/files/boost/1.60.0/boost_1_60_0.tar.bz2/download',
      configPath: '/work/build/boost_1_60_0/user-config.jam'
    })
  })
})

describe('source acquisition', () => {
  let rootPath: string
  let env: BuildEnv
  let log: jest.SpyInstance

  beforeEach(async () => {
    rootPath = await mkdtemp(join(tmpdir(), 'boost-source-'))
    env = await makeTestEnv(rootPath)
    log = jest.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(async () => {
    log.mockRestore()
    await rm(rootPath, { recursive: true, force: true })
  })

  it('downloads and unpacks a fresh tree', async () => {
    const source = makeBoostSource(env, defaultConfig)
    const toolbox = makeFakeToolbox()
    await runInBuild(env.buildPath, toolbox, async build => {
      await ensureDownloaded(build, source)
      await ensureUnpacked(build, source)
    })

    expect(toolbox.calls).toEqual([
      {
        command: 'curl',
        args: ['-L', '-o', source.tarballPath, source.tarballUrl],
        cwd: env.buildPath
      },
      {
        command: 'tar',
        args: ['xfj', source.tarballPath],
        cwd: env.buildPath
      }
    ])
  })

  it('reuses an existing tarball and tree', async () => {
    const source = makeBoostSource(env, defaultConfig)
    await mkdir(source.rootPath, { recursive: true })
    await writeFile(source.tarballPath, 'tarball')

    const toolbox = makeFakeToolbox()
    await runInBuild(env.buildPath, toolbox, async build => {
      await ensureDownloaded(build, source)
      await ensureUnpacked(build, source)
    })
    expect(toolbox.calls).toEqual([])
  })

  it('stops when the download fails', async () => {
    const source = makeBoostSource(env, defaultConfig)
    const toolbox = makeFakeToolbox({ fail: call => call.command === 'curl' })
    const reason = await failureReason(
      runInBuild(env.buildPath, toolbox, async build => {
        await ensureDownloaded(build, source)
        await ensureUnpacked(build, source)
      })
    )
    expect(reason).toMatchObject({ status: 1 })
    expect(toolbox.calls.map(call => call.command)).toEqual(['curl'])
  })

  it('needs a tarball to unpack', async () => {
    const source = makeBoostSource(env, defaultConfig)
    const reason = await failureReason(
      runInBuild(env.buildPath, makeFakeToolbox(), async build => {
        await ensureUnpacked(build, source)
      })
    )
    expect(reason).toBeInstanceOf(MissingFileError)
    expect(reason).toMatchObject({ path: source.tarballPath })
  })

  it('bootstraps with the chosen libraries', async () => {
    const source = makeBoostSource(env, defaultConfig)
    const toolbox = makeFakeToolbox()
    await runInBuild(env.buildPath, toolbox, async build => {
      await bootstrap(build, source, defaultConfig)
    })
    expect(toolbox.calls).toEqual([
      {
        command: './bootstrap.sh',
        args: ['--with-libraries=chrono,thread,system'],
        cwd: source.rootPath
      }
    ])
  })
})

describe('patchMissingHeaders', () => {
  let rootPath: string
  let log: jest.SpyInstance

  beforeEach(async () => {
    rootPath = await mkdtemp(join(tmpdir(), 'boost-patch-'))
    log = jest.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(async () => {
    log.mockRestore()
    await rm(rootPath, { recursive: true, force: true })
  })

  it('copies headers the source tree lacks', async () => {
    const env = await makeTestEnv(rootPath)
    const source = makeBoostSource(env, defaultConfig)
    await mkdir(source.rootPath, { recursive: true })
    await writeFile(join(source.rootPath, 'bzlib.h'), '// ours\n')

    await runInBuild(env.buildPath, makeFakeToolbox(), async build => {
      await patchMissingHeaders(build, env, source)
    })

    const crtExterns = join(source.rootPath, 'crt_externs.h')
    expect(await readFile(crtExterns, 'utf8')).toBe('// crt_externs\n')
    const bzlib = join(source.rootPath, 'bzlib.h')
    expect(await readFile(bzlib, 'utf8')).toBe('// ours\n')
  })

  it('stops if the simulator SDK lacks a header', async () => {
    const env = makeBuildEnv(rootPath, {
      xcodeRoot: join(rootPath, 'Xcode'),
      iosSdkVersion: '9.3',
      osxSdkVersion: '10.11'
    })
    const source = makeBoostSource(env, defaultConfig)
    const reason = await failureReason(
      runInBuild(env.buildPath, makeFakeToolbox(), async build => {
        await patchMissingHeaders(build, env, source)
      })
    )
    expect(reason).toBeInstanceOf(MissingFileError)
    expect(reason).toMatchObject({
      path: join(env.simulatorSdkPath, 'usr/include/crt_externs.h')
    })
  })
})
