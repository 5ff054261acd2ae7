import { mkdir, open } from 'node:fs/promises'
import { join, resolve } from 'node:path'

import {
  ExecError,
  formatCommand,
  spawnTool,
  toolName,
  type ToolRunner
} from './common'

/**
 * A build step that can be run.
 * Use `addTask` to ensure names are unique.
 */
export interface Task {
  name: string
  run: (build: Build) => Promise<void>
}

export interface ExecOptions {
  cwd?: string
  capture?: true

  /** Return normally even if the tool exits with a non-zero status. */
  ignoreFailure?: true
}

/**
 * Context about the current build.
 */
export interface Build {
  /** The top-level working directory. All output should go under here. */
  readonly basePath: string

  /** Changes the default directory used for exec */
  readonly cwd: string
  cd: (path: string) => void

  /**
   * Runs the callback with `cwd` set to the given path,
   * putting the old directory back however the callback exits.
   */
  inDir: <T>(path: string, callback: () => Promise<T>) => Promise<T>

  /**
   * Spawn an external tool.
   * Output automatically goes to the task log file,
   * and returns as a string if `capture` is set.
   */
  exec: (
    command: string,
    args?: readonly string[],
    opts?: ExecOptions
  ) => Promise<string>

  /**
   * Log output for the task.
   * Use `console.log` only for progress the user should see.
   */
  log: (message: string) => void

  /**
   * Launches another task, once per build.
   */
  runTask: (name: string) => Promise<void>
}

export class TaskError extends Error {
  readonly taskName: string
  readonly reason: unknown // The actual error

  constructor(taskName: string, reason: unknown) {
    super(`Task failed: ${taskName}`)
    this.taskName = taskName
    this.reason = reason
  }
}

/**
 * Digs the original failure out of a chain of task errors.
 */
export function rootCause(error: unknown): unknown {
  while (error instanceof TaskError) error = error.reason
  return error
}

/**
 * A registry of tasks, so they can be called by name.
 */
export interface TaskList {
  addTask: (name: string, run: (build: Build) => Promise<void>) => Task
  getTask: (name: string) => Task
}

export function makeTaskList(): TaskList {
  const tasks = new Map<string, Task>()

  return {
    addTask(name, run) {
      if (tasks.has(name)) {
        throw new Error(`Task "${name}" already exists`)
      }
      const task: Task = { name, run }
      tasks.set(name, task)
      return task
    },

    getTask(name) {
      const task = tasks.get(name)
      if (task == null) throw new Error(`Cannot find task "${name}"`)
      return task
    }
  }
}

export interface BuildOptions {
  basePath: string

  /** Echo tool output to the console, not just the log files. */
  verbose?: boolean

  runTool?: ToolRunner
}

/**
 * Begins a build process, using the named task as a starting point.
 * Tasks run one at a time, and each tool runs to completion
 * before the next one starts.
 */
export async function startBuild(
  tasks: TaskList,
  name: string,
  opts: BuildOptions
): Promise<void> {
  const { basePath, verbose = false, runTool = spawnTool } = opts
  const logPath = join(basePath, 'logs')
  await mkdir(logPath, { recursive: true })

  // Used to guard against recursion
  interface Stack {
    task: Task
    parent: Stack | undefined
  }

  // If we are already working on a task, don't work on it again:
  const states = new Map<Task, Promise<void>>()

  async function runTaskOnce(
    task: Task,
    parent: Stack | undefined
  ): Promise<void> {
    const running = states.get(task)
    if (running != null) return await running
    const state = runTaskInner(task, parent)
    states.set(task, state)
    return await state
  }

  async function runTaskInner(
    task: Task,
    parent: Stack | undefined
  ): Promise<void> {
    const stack: Stack = { task, parent }
    const logFile = join(logPath, `${task.name}.log`)
    const fd = await open(logFile, 'w')
    const logStream = fd.createWriteStream({ encoding: 'utf8' })

    let workPath = basePath
    const build: Build = {
      basePath,

      get cwd() {
        return workPath
      },

      cd(path) {
        workPath = resolve(workPath, path)
      },

      async inDir(path, callback) {
        const savedPath = workPath
        build.cd(path)
        try {
          return await callback()
        } finally {
          workPath = savedPath
        }
      },

      async exec(command, args = [], opts = {}) {
        const { capture = false, cwd = workPath, ignoreFailure = false } = opts
        logStream.write(`$ ${formatCommand(command, args)}\n`)

        const prefix = toolName(command, args)
        let stdoutBuf = ''
        const status = await runTool({
          command,
          args,
          cwd: resolve(workPath, cwd),
          onLine(line, stream) {
            logStream.write(line + '\n')
            if (capture && stream === 'stdout') stdoutBuf += line + '\n'
            if (verbose && line.trim() !== '') {
              console.log(`${prefix}| ${line}`)
            }
          }
        })

        if (status !== 0) {
          if (!ignoreFailure) throw new ExecError(command, args, status)
          logStream.write(`(ignored status ${status})\n`)
        }
        return stdoutBuf
      },

      log(message: string): void {
        logStream.write(message + '\n')
      },

      async runTask(name) {
        const task = tasks.getTask(name)

        // Check for recursion before we start:
        const steps: string[] = [task.name]
        for (let i: Stack | undefined = stack; i != null; i = i.parent) {
          steps.push(i.task.name)
          if (i.task === task) {
            const trace = steps.reverse().join(' > ')
            throw new Error(`Build recursion detected: ${trace}`)
          }
        }

        await runTaskOnce(task, stack)
      }
    }

    console.log(`${task.name} started`)
    await task
      .run(build)
      .then(() => {
        console.log(`${task.name} completed`)
      })
      .catch((error: unknown) => {
        if (!(error instanceof TaskError))
          console.log(`${task.name} failed: ${String(error)}\n  See ${logFile}`)
        throw new TaskError(task.name, error)
      })
      .finally(async () => {
        // Close the log stream:
        await new Promise<void>(resolve => logStream.end(resolve))
      })
  }

  await runTaskOnce(tasks.getTask(name), undefined)
}
