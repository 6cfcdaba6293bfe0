import { RATING_MAX, RATING_MIN } from '@shared/constants';
import type { LifecycleName, RegistryErrorKind, ServiceState } from '@shared/types';
import { isMember, type Lifecycle } from './lifecycle';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Registry operation a transition is requested through. */
export type TransitionRoute =
  | 'changeState'
  | 'assignCompanion'
  | 'markPaid'
  | 'finalizeService';

export type SideEffect = 'none' | 'mint-evidence' | 'transfer-to-companion';

export type GuardName = 'guardCompanionAssigned' | 'guardRatingInRange';

export interface TransitionEdge {
  to: ServiceState;
  routes: readonly TransitionRoute[];
  guards: readonly GuardName[];
  effect: SideEffect;
}

export interface TransitionContext {
  tokenId: number;
  lifecycle: Lifecycle;
  currentState: ServiceState;
  /** Companion the token will carry once the transition applies. */
  companion: string | null;
  rating?: number;
  isEvidence: boolean;
}

export interface GuardResult {
  guardName: GuardName;
  passed: boolean;
  reason?: string;
  failure?: RegistryErrorKind;
}

export interface TransitionSuccess {
  ok: true;
  fromState: ServiceState;
  newState: ServiceState;
  rating: number;
  effect: SideEffect;
  guardResults: GuardResult[];
}

export interface TransitionFailure {
  ok: false;
  kind: RegistryErrorKind;
  error: string;
  guardResults?: GuardResult[];
}

export type TransitionResult = TransitionSuccess | TransitionFailure;

// ---------------------------------------------------------------------------
// Transition Table
// ---------------------------------------------------------------------------

export const TRANSITION_TABLE: Record<
  LifecycleName,
  Partial<Record<ServiceState, readonly TransitionEdge[]>>
> = {
  full: {
    Created: [
      {
        to: 'Matched',
        routes: ['changeState'],
        guards: ['guardCompanionAssigned'],
        effect: 'none',
      },
    ],
    Matched: [{ to: 'Completed', routes: ['changeState'], guards: [], effect: 'none' }],
    Completed: [
      {
        to: 'Rated',
        routes: ['changeState'],
        guards: ['guardRatingInRange'],
        effect: 'none',
      },
    ],
    Rated: [
      {
        to: 'Paid',
        routes: ['changeState', 'markPaid'],
        guards: ['guardCompanionAssigned'],
        effect: 'mint-evidence',
      },
    ],
  },
  simplified: {
    Created: [
      {
        to: 'Matched',
        routes: ['assignCompanion'],
        guards: ['guardCompanionAssigned'],
        effect: 'transfer-to-companion',
      },
    ],
    Matched: [
      {
        to: 'Finished',
        routes: ['changeState', 'finalizeService'],
        guards: [],
        effect: 'none',
      },
    ],
  },
};

/**
 * Targets that may only be entered from one specific state. Entering them
 * from anywhere else is a precondition failure, not an unknown edge.
 */
export const ENTRY_PRECONDITIONS: Partial<Record<ServiceState, ServiceState>> = {
  Paid: 'Rated',
};

export function allowedNext(
  lifecycle: Lifecycle,
  current: ServiceState,
): readonly TransitionEdge[] {
  return TRANSITION_TABLE[lifecycle.name][current] ?? [];
}

// ---------------------------------------------------------------------------
// Guard Functions
// ---------------------------------------------------------------------------

type GuardFn = (ctx: TransitionContext) => GuardResult;

export function guardCompanionAssigned(ctx: TransitionContext): GuardResult {
  if (ctx.companion) {
    return { guardName: 'guardCompanionAssigned', passed: true };
  }

  return {
    guardName: 'guardCompanionAssigned',
    passed: false,
    reason: `Token ${ctx.tokenId} has no companion assigned`,
    failure: 'PreconditionFailed',
  };
}

export function guardRatingInRange(ctx: TransitionContext): GuardResult {
  const { rating } = ctx;

  if (rating === undefined) {
    return {
      guardName: 'guardRatingInRange',
      passed: false,
      reason: 'A rating is required to enter a rated state',
      failure: 'InvalidRating',
    };
  }

  if (!Number.isInteger(rating) || rating < RATING_MIN || rating > RATING_MAX) {
    return {
      guardName: 'guardRatingInRange',
      passed: false,
      reason: `Rating must be an integer between ${RATING_MIN} and ${RATING_MAX} (got ${rating})`,
      failure: 'InvalidRating',
    };
  }

  return { guardName: 'guardRatingInRange', passed: true };
}

export const GUARDS: Record<GuardName, GuardFn> = {
  guardCompanionAssigned,
  guardRatingInRange,
};

export function checkGuards(edge: TransitionEdge, ctx: TransitionContext): GuardResult[] {
  return edge.guards.map((name) => GUARDS[name](ctx));
}

// ---------------------------------------------------------------------------
// Transition Reducer
// ---------------------------------------------------------------------------

/**
 * Pure reducer: decides whether `ctx.currentState -> target` may happen
 * through `route`, and what it implies (stored rating, side effect). It never
 * touches the registry or the ledger.
 */
export function transition(
  target: ServiceState,
  route: TransitionRoute,
  ctx: TransitionContext,
): TransitionResult {
  const { lifecycle, currentState } = ctx;

  // 1. Evidence tokens never move
  if (ctx.isEvidence) {
    return {
      ok: false,
      kind: 'PreconditionFailed',
      error: `Token ${ctx.tokenId} is an evidence record and cannot change`,
    };
  }

  // 2. Transition table check
  const edges = allowedNext(lifecycle, currentState);
  const edge = edges.find((e) => e.to === target);

  if (!edge) {
    const required = ENTRY_PRECONDITIONS[target];
    if (required && isMember(lifecycle, target) && currentState !== required) {
      return {
        ok: false,
        kind: 'PreconditionFailed',
        error: `'${target}' can only be entered from '${required}' (token ${ctx.tokenId} is '${currentState}')`,
      };
    }

    if (edges.length === 0) {
      return {
        ok: false,
        kind: 'InvalidTransition',
        error: `No transitions defined from state '${currentState}'`,
      };
    }

    return {
      ok: false,
      kind: 'InvalidTransition',
      error: `Transition '${currentState}' -> '${target}' is not allowed; expected ${edges
        .map((e) => `'${e.to}'`)
        .join(' or ')}`,
    };
  }

  // 3. Route check
  if (!edge.routes.includes(route)) {
    return {
      ok: false,
      kind: 'InvalidTransition',
      error: `'${target}' is reached through ${edge.routes.join(' or ')}, not ${route}`,
    };
  }

  // 4. Guard evaluation
  const guardResults = checkGuards(edge, ctx);
  const failed = guardResults.filter((g) => !g.passed);

  if (failed.length > 0) {
    return {
      ok: false,
      kind: failed[0].failure ?? 'PreconditionFailed',
      error: failed.map((g) => g.reason ?? g.guardName).join('; '),
      guardResults,
    };
  }

  // 5. Success
  return {
    ok: true,
    fromState: currentState,
    newState: target,
    rating: lifecycle.ratedStates.includes(target) ? (ctx.rating ?? 0) : 0,
    effect: edge.effect,
    guardResults,
  };
}
