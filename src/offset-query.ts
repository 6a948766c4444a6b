/**
 * Offset Query Results
 *
 * Narrowing helpers over the result of resolving a local date-time.
 */

import type { ZoneOffset } from './zone-offset'
import type { OffsetQueryResult, ZoneOffsetTransition } from './domain-types'
import { formatOffset } from './zone-offset'
import { formatTransition } from './transition'

export type { OffsetQueryResult } from './domain-types'

export type SingleOffset = Extract<OffsetQueryResult, { type: 'single' }>
export type OffsetDiscontinuity = Extract<OffsetQueryResult, { type: 'discontinuity' }>

export function singleOffset(offset: ZoneOffset): OffsetQueryResult {
  return { type: 'single', offset }
}

export function discontinuity(transition: ZoneOffsetTransition): OffsetQueryResult {
  return {
    type: 'discontinuity',
    kind: transition.offsetAfter > transition.offsetBefore ? 'gap' : 'overlap',
    offsetBefore: transition.offsetBefore,
    offsetAfter: transition.offsetAfter,
    transition,
  }
}

export function isSingle(result: OffsetQueryResult): result is SingleOffset {
  return result.type === 'single'
}

export function isDiscontinuity(result: OffsetQueryResult): result is OffsetDiscontinuity {
  return result.type === 'discontinuity'
}

export function isGapResult(result: OffsetQueryResult): result is OffsetDiscontinuity {
  return result.type === 'discontinuity' && result.kind === 'gap'
}

export function isOverlapResult(result: OffsetQueryResult): result is OffsetDiscontinuity {
  return result.type === 'discontinuity' && result.kind === 'overlap'
}

/** Offsets a local date-time may take: one, none in a gap, two in an overlap. */
export function validOffsetsOf(result: OffsetQueryResult): ZoneOffset[] {
  if (result.type === 'single') return [result.offset]
  return result.kind === 'gap' ? [] : [result.offsetBefore, result.offsetAfter]
}

export function formatOffsetQueryResult(result: OffsetQueryResult): string {
  if (result.type === 'single') return `Single[${formatOffset(result.offset)}]`
  return `${result.kind === 'gap' ? 'Gap' : 'Overlap'}[${formatTransition(result.transition)}]`
}
