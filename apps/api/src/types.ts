import type { CloseResult, OpenOutcome } from '@scanledger/core'

export type OutcomeCounts = Record<OpenOutcome, number>

export interface RunSummary extends OutcomeCounts, CloseResult {
  notified: number
  latestCleared: number
  closingTime: string | null
}

export interface HostRunSummary extends CloseResult {
  up: number
  latestCleared: number
}

export interface ApiError { code: string; message: string }
