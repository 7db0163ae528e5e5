import type {
  GovernorTransitionKind,
  LogPeerState,
  StatusChangeKind,
  TransitionKind,
} from './types'

export type Transition = { from: LogPeerState; to: LogPeerState }

/**
 * Every transition a trace may apply to a peer
 */
export const TRANSITIONS: Readonly<Record<TransitionKind, Transition>> = {
  ColdToWarm: { from: 'Cold', to: 'Warm' },
  WarmToHot: { from: 'Warm', to: 'Hot' },
  HotToWarm: { from: 'Hot', to: 'Warm' },
  WarmToCold: { from: 'Warm', to: 'Cold' },
  PromotedToWarm: { from: 'Cold', to: 'Warm' },
  PromotedToHot: { from: 'Warm', to: 'Hot' },
  DemotedToWarm: { from: 'Hot', to: 'Warm' },
  DemotedToCold: { from: 'Warm', to: 'Cold' },
}

export const STATUS_CHANGE_KINDS: readonly StatusChangeKind[] = [
  'ColdToWarm',
  'WarmToHot',
  'HotToWarm',
  'WarmToCold',
]

export const GOVERNOR_TRANSITION_KINDS: readonly GovernorTransitionKind[] = [
  'PromotedToWarm',
  'PromotedToHot',
  'DemotedToWarm',
  'DemotedToCold',
]

/**
 * Look up the status change for a (from, to) pair, undefined when the
 * pair is not a legal transition
 */
export function statusChangeFor(
  from: LogPeerState,
  to: LogPeerState,
): StatusChangeKind | undefined {
  return STATUS_CHANGE_KINDS.find(
    (kind) => TRANSITIONS[kind].from === from && TRANSITIONS[kind].to === to,
  )
}

export function isGovernorTransitionKind(
  value: string,
): value is GovernorTransitionKind {
  return GOVERNOR_TRANSITION_KINDS.some((kind) => kind === value)
}
