/**
 * Cronark Process Monitor
 *
 * OS process introspection for the duplicate-prevention protocol.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import { execFileSync } from 'node:child_process'
import type { Pid, ProcessMonitor } from '../types.js'

/** Timeout for `ps` / PowerShell lookups */
const LOOKUP_TIMEOUT_MS = 5000

/**
 * Process monitor backed by the running Node.js process.
 *
 * Script paths come from `/proc/<pid>/cmdline` on Linux, `ps` on other
 * Unixes and a CIM query on Windows. The script is the first argument after
 * the interpreter, resolved against the process's working directory when
 * possible.
 */
export class NodeProcessMonitor implements ProcessMonitor {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  currentProcessId(): Pid {
    return process.pid
  }

  /**
   * Signal 0 probes for existence; EPERM means it exists under another user.
   */
  processExists(pid: Pid): boolean {
    if (!Number.isInteger(pid) || pid <= 0) {
      return false
    }

    try {
      process.kill(pid, 0)
      return true
    } catch (error) {
      return (error as NodeJS.ErrnoException).code === 'EPERM'
    }
  }

  scriptPathOf(pid: Pid): string | null {
    if (!this.processExists(pid)) {
      return null
    }

    if (this.platform === 'linux') {
      return this.linuxScriptPath(pid)
    }

    if (this.platform === 'win32') {
      return this.windowsScriptPath(pid)
    }

    return this.psScriptPath(pid)
  }

  /**
   * Send SIGTERM.
   *
   * Success means the signal was delivered, not that the target has exited;
   * a process that ignores SIGTERM still counts as terminated. Its loop ends
   * at the next pid check once another process claims the worker.
   *
   * @returns false when the process is gone or may not be signalled (EPERM)
   */
  terminate(pid: Pid): boolean {
    if (!this.processExists(pid)) {
      return false
    }

    try {
      return process.kill(pid, 'SIGTERM')
    } catch {
      return false
    }
  }

  private linuxScriptPath(pid: Pid): string | null {
    let cmdline: string
    try {
      cmdline = fs.readFileSync(`/proc/${pid}/cmdline`, 'utf-8')
    } catch {
      return null
    }

    const script = cmdline.split('\0').filter(Boolean)[1]
    if (script === undefined) {
      return null
    }

    let cwd: string | null
    try {
      cwd = fs.readlinkSync(`/proc/${pid}/cwd`)
    } catch {
      // Not ours to read
      cwd = null
    }

    return resolveScript(script, cwd)
  }

  private psScriptPath(pid: Pid): string | null {
    const output = runLookup('ps', ['-o', 'command=', '-p', String(pid)])
    if (output === null) {
      return null
    }

    const script = splitCommandLine(output)[1]
    return script === undefined ? null : resolveScript(script, null)
  }

  private windowsScriptPath(pid: Pid): string | null {
    const output = runLookup('powershell', [
      '-NoProfile',
      '-Command',
      `(Get-CimInstance Win32_Process -Filter "ProcessId=${pid}").CommandLine`,
    ])
    if (output === null) {
      return null
    }

    const script = splitCommandLine(output)[1]
    return script === undefined ? null : resolveScript(script, null)
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Run a lookup command; null when it fails or prints nothing.
 */
function runLookup(command: string, args: string[]): string | null {
  try {
    const output = execFileSync(command, args, {
      encoding: 'utf-8',
      timeout: LOOKUP_TIMEOUT_MS,
      stdio: ['ignore', 'pipe', 'ignore'],
      windowsHide: true,
    }).trim()
    return output === '' ? null : output
  } catch {
    return null
  }
}

/**
 * Split a command line on whitespace, keeping double-quoted segments whole.
 */
export function splitCommandLine(commandLine: string): string[] {
  const parts: string[] = []
  const pattern = /"([^"]*)"|(\S+)/g
  let match: RegExpExecArray | null

  while ((match = pattern.exec(commandLine)) !== null) {
    parts.push(match[1] ?? match[2] ?? '')
  }

  return parts
}

/**
 * Absolute, symlink-free form of a script path when it exists on disk.
 */
export function resolveScript(script: string, cwd: string | null): string {
  const candidate = cwd !== null && !path.isAbsolute(script) ? path.resolve(cwd, script) : script

  try {
    return fs.realpathSync(candidate)
  } catch {
    return candidate
  }
}
