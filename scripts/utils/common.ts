import { spawn } from 'node:child_process'
import { readdir, stat } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { createInterface } from 'node:readline'

export type OutputStream = 'stdout' | 'stderr'

/**
 * Everything needed to launch an external tool.
 */
export interface ToolRun {
  command: string
  args: readonly string[]
  cwd: string

  /** Receives each line of output as it arrives. */
  onLine: (line: string, stream: OutputStream) => void
}

/**
 * Runs a tool to completion and returns its exit status.
 * Builds accept a replacement, so tests never launch real tools.
 */
export type ToolRunner = (run: ToolRun) => Promise<number>

export class ExecError extends Error {
  readonly command: string
  readonly args: readonly string[]
  readonly status: number

  constructor(command: string, args: readonly string[], status: number) {
    super(`${formatCommand(command, args)} failed with status ${status}`)
    this.command = command
    this.args = args
    this.status = status
  }
}

export class MissingFileError extends Error {
  readonly path: string

  constructor(path: string, what: string = 'File') {
    super(`${what} doesn't exist: ${path}`)
    this.path = path
  }
}

export const spawnTool: ToolRunner = async run =>
  await new Promise<number>((resolve, reject) => {
    const child = spawn(run.command, run.args, {
      cwd: run.cwd,
      stdio: ['inherit', 'pipe', 'pipe']
    })
    createInterface({ input: child.stdout }).on('line', line =>
      run.onLine(line, 'stdout')
    )
    createInterface({ input: child.stderr }).on('line', line =>
      run.onLine(line, 'stderr')
    )

    child.on('error', reject)
    child.on('close', (code, signal) => {
      if (signal != null) run.onLine(`Killed by ${signal}`, 'stderr')
      resolve(code ?? 1)
    })
  })

export function formatCommand(
  command: string,
  args: readonly string[]
): string {
  return [command, ...args].join(' ')
}

/**
 * The name we prefix tool output with, looking through shell wrappers.
 */
export function toolName(command: string, args: readonly string[]): string {
  const name = basename(command)
  if (name !== 'sh' && name !== 'bash') return name
  const script = args.find(arg => arg !== '-x')
  return script == null ? name : basename(script)
}

/**
 * Runs a tool, returning its trimmed standard output.
 */
export async function quietExec(
  command: string,
  args: readonly string[] = [],
  opts: { cwd?: string; runTool?: ToolRunner } = {}
): Promise<string> {
  const { cwd = process.cwd(), runTool = spawnTool } = opts
  const lines: string[] = []
  const status = await runTool({
    command,
    args,
    cwd,
    onLine(line, stream) {
      if (stream === 'stdout') lines.push(line)
    }
  })
  if (status !== 0) throw new ExecError(command, args, status)
  return lines.join('\n').trim()
}

export async function fileExists(path: string): Promise<boolean> {
  return await stat(path).then(
    stats => stats.isFile(),
    () => false
  )
}

export async function dirExists(path: string): Promise<boolean> {
  return await stat(path).then(
    stats => stats.isDirectory(),
    () => false
  )
}

/**
 * Lists the plain files directly inside a directory, sorted by name.
 */
export async function listFiles(
  path: string,
  filter: (name: string) => boolean = () => true
): Promise<string[]> {
  const entries = await readdir(path, { withFileTypes: true })
  return entries
    .filter(entry => entry.isFile() && filter(entry.name))
    .map(entry => entry.name)
    .sort()
}

/**
 * Recursively lists every file under a directory.
 */
export async function* lsr(path: string): AsyncGenerator<string> {
  const entries = await readdir(path, { withFileTypes: true })
  for (const entry of entries) {
    const child = join(path, entry.name)
    if (entry.isDirectory()) yield* lsr(child)
    else yield child
  }
}
