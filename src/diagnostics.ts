/**
 * Request diagnostics
 *
 * When enabled, every dispatched request is recorded with the document it
 * produced (or the code of the error it raised) so a failing scenario can be
 * inspected afterwards. Recording never changes what a request returns.
 */

import type { SerializedDocument } from './types'

let enabledGlobally = false

/** Turn recording on for every mock environment in the process */
export function enableDiagnostics(): void {
  enabledGlobally = true
}

export function disableDiagnostics(): void {
  enabledGlobally = false
}

export function diagnosticsEnabled(): boolean {
  return enabledGlobally
}

export interface DiagnosticsEntry {
  verb: string
  path: string
  /** Present when the request succeeded */
  document?: SerializedDocument
  /** Error code when the request failed */
  error?: string
}

export class DiagnosticsLog {
  private readonly recorded: DiagnosticsEntry[] = []

  /** @param enabled per-instance switch, combined with the process-wide one */
  constructor(private readonly enabled: () => boolean = () => false) {}

  get active(): boolean {
    return enabledGlobally || this.enabled()
  }

  get entries(): readonly DiagnosticsEntry[] {
    return this.recorded
  }

  record(entry: DiagnosticsEntry): void {
    if (this.active) this.recorded.push(entry)
  }

  clear(): void {
    this.recorded.length = 0
  }

  /** Log the recorded requests, one line each */
  print(log: (line: string) => void = console.log): void {
    for (const entry of this.recorded) {
      const outcome = entry.error ? `error ${entry.error}` : JSON.stringify(entry.document)
      log(`[mock] ${entry.verb} ${entry.path} -> ${outcome}`)
    }
  }
}
