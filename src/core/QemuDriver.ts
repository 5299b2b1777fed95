import { ChildProcess, spawn } from 'child_process'
import { Debugger } from '../utils/debug'
import { DEFAULT_QEMU_BINARY, TokenSequence } from '../types/qemu.types'
import { ProcessSupervisor } from '../types/step.types'
import { QemuBuilderConfig } from '../types/config.types'

/**
 * Options for QemuDriver
 */
export interface QemuDriverOptions {
  /** QEMU binary (default: qemu-system-x86_64) */
  binary?: string
  /** Time to wait after SIGTERM before SIGKILL (default: 30000) */
  stopTimeoutMs?: number
  /** Time the process must stay up for start() to succeed (default: 1000) */
  startupGraceMs?: number
}

interface ExitInfo {
  code: number | null
  signal: NodeJS.Signals | null
  error?: Error
}

interface RunningProcess {
  child: ChildProcess
  /** Settles once the process is gone, however that happened */
  exited: Promise<ExitInfo>
}

export const DEFAULT_STOP_TIMEOUT_MS = 30000
export const DEFAULT_STARTUP_GRACE_MS = 1000

/**
 * QemuDriver runs a single QEMU process for a pipeline run.
 *
 * The process is spawned without a shell. start() resolves once QEMU is
 * still alive after the startup grace period, so configuration errors that
 * make QEMU exit immediately surface as start failures with stderr attached.
 */
export class QemuDriver implements ProcessSupervisor {
  private readonly binary: string
  private readonly stopTimeoutMs: number
  private readonly startupGraceMs: number
  private readonly debug: Debugger
  private running: RunningProcess | null = null
  private stopping: Promise<void> | null = null

  constructor (options: QemuDriverOptions = {}) {
    this.binary = options.binary ?? DEFAULT_QEMU_BINARY
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS
    this.startupGraceMs = options.startupGraceMs ?? DEFAULT_STARTUP_GRACE_MS
    this.debug = new Debugger('qemu-driver')
  }

  /**
   * Start QEMU with the given arguments
   * @throws Error if a process is already running, or if QEMU fails to spawn or exits during startup
   */
  async start (args: TokenSequence): Promise<void> {
    if (this.running) {
      throw new Error(`QEMU is already running (PID ${this.running.child.pid})`)
    }

    this.logCommand(args)

    let stderrBuffer = ''
    const child = spawn(this.binary, args, { stdio: ['ignore', 'pipe', 'pipe'] })

    child.stdout?.on('data', (data: Buffer) => {
      this.debug.log('stdout', data.toString())
    })
    child.stderr?.on('data', (data: Buffer) => {
      const str = data.toString()
      stderrBuffer += str
      this.debug.log('stderr', str)
    })

    const exited = new Promise<ExitInfo>(resolve => {
      let done = false
      const onGone = (info: ExitInfo) => {
        if (done) return
        done = true
        if (this.running?.child === child) {
          this.running = null
        }
        this.debug.log(`QEMU exited with code ${info.code}, signal ${info.signal}`)
        resolve(info)
      }
      child.on('exit', (code, signal) => onGone({ code, signal }))
      child.on('error', (error) => onGone({ code: null, signal: null, error }))
    })
    this.running = { child, exited }

    let graceTimer: NodeJS.Timeout | undefined
    const grace = new Promise<null>(resolve => {
      graceTimer = setTimeout(() => resolve(null), this.startupGraceMs)
    })
    const earlyExit = await Promise.race([exited, grace])
    clearTimeout(graceTimer)

    if (earlyExit) {
      const errorMsg = earlyExit.error
        ? `Failed to start ${this.binary}: ${earlyExit.error.message}`
        : `${this.binary} exited during startup with code ${earlyExit.code}, signal ${earlyExit.signal}` +
          (stderrBuffer ? `: ${stderrBuffer.trim()}` : '')
      this.debug.log('error', errorMsg)
      throw new Error(errorMsg)
    }

    this.debug.log(`QEMU started with PID ${child.pid}`)
  }

  /**
   * Stop QEMU: SIGTERM, then SIGKILL after the stop timeout.
   * Does nothing when no process is running. Concurrent calls share one stop.
   */
  async stop (): Promise<void> {
    if (this.stopping) {
      this.debug.log('Stop already in progress')
      return this.stopping
    }

    const handle = this.running
    if (!handle) {
      this.debug.log('QEMU is not running')
      return
    }

    this.stopping = this.terminate(handle).finally(() => {
      this.stopping = null
    })
    return this.stopping
  }

  /**
   * Wait for QEMU to exit on its own.
   *
   * @returns true once the process has exited, false if the signal aborted first
   */
  async waitForShutdown (signal?: AbortSignal): Promise<boolean> {
    const handle = this.running
    if (!handle) {
      return true
    }
    if (signal?.aborted) {
      return false
    }

    let onAbort = (): void => {}
    const aborted = new Promise<false>(resolve => {
      onAbort = () => resolve(false)
      signal?.addEventListener('abort', onAbort, { once: true })
    })

    const result = await Promise.race([handle.exited.then(() => true), aborted])
    signal?.removeEventListener('abort', onAbort)
    return result
  }

  isRunning (): boolean {
    return this.running !== null
  }

  getPid (): number | null {
    return this.running?.child.pid ?? null
  }

  private async terminate (handle: RunningProcess): Promise<void> {
    const pid = handle.child.pid
    this.debug.log(`Stopping QEMU (PID ${pid})`)

    if (!handle.child.kill('SIGTERM')) {
      throw new Error(`Failed to send SIGTERM to QEMU (PID ${pid})`)
    }

    let timer: NodeJS.Timeout | undefined
    const timedOut = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), this.stopTimeoutMs)
    })
    const result = await Promise.race([handle.exited, timedOut])
    clearTimeout(timer)

    if (result === 'timeout') {
      this.debug.log('warn', `QEMU (PID ${pid}) did not stop after ${this.stopTimeoutMs}ms, force killing`)
      if (!handle.child.kill('SIGKILL')) {
        throw new Error(`Failed to send SIGKILL to QEMU (PID ${pid})`)
      }
      await handle.exited
    }

    this.debug.log(`QEMU (PID ${pid}) stopped`)
  }

  private logCommand (args: TokenSequence): void {
    this.debug.log(`Command: ${this.binary}`)
    this.debug.log(`Arguments (${args.length}):`)
    for (let i = 0; i < args.length; i++) {
      const value = args[i + 1]
      if (value !== undefined && !value.startsWith('-')) {
        this.debug.log(`  ${args[i]} ${value}`)
        i++
      } else {
        this.debug.log(`  ${args[i]}`)
      }
    }
  }
}

/**
 * Creates the driver for a configuration, running `config.qemuBinary`
 */
export function createDriver (
  config: Pick<QemuBuilderConfig, 'qemuBinary'>,
  options: Omit<QemuDriverOptions, 'binary'> = {}
): QemuDriver {
  return new QemuDriver({ ...options, binary: config.qemuBinary })
}
