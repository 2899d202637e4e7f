import type { SignalName, StepName } from '../schema/index.js';

// ── Step specs ───────────────────────────────────────────────

export type Navigation =
  | { readonly kind: 'goto'; readonly suffix: string }
  /** Reuse the collection's landing page, loading it only when it is not on screen. */
  | { readonly kind: 'stay' };

export interface StepAction {
  readonly kind: 'click';
  readonly target: SignalName;
}

export interface StepSpec {
  readonly name: StepName;
  readonly navigation?: Navigation;
  readonly readySignal?: SignalName;
  readonly busySignal?: SignalName;
  readonly action?: StepAction;
}

/**
 * The fixed page sequence visited for every collection, in order.
 * `edit-metadata` reuses the landing page when `landing` just left it
 * on screen.
 */
export const STEP_SPECS: readonly StepSpec[] = [
  {
    name: 'landing',
    navigation: { kind: 'goto', suffix: '' },
    busySignal: 'progress',
  },
  {
    name: 'edit-metadata',
    navigation: { kind: 'stay' },
    busySignal: 'progress',
    action: { kind: 'click', target: 'editMetadataButton' },
    readySignal: 'metadataEditor',
  },
  {
    name: 'view-data',
    navigation: { kind: 'goto', suffix: '/draft/files' },
    busySignal: 'fileListProgress',
  },
];

/** Whether a successful run of `spec` leaves its collection's landing page on screen. */
export function showsLanding(spec: StepSpec): boolean {
  return (
    spec.navigation?.kind === 'goto' && spec.navigation.suffix === '' && spec.action === undefined
  );
}

export const STEP_NAMES: readonly StepName[] = STEP_SPECS.map((spec) => spec.name);

export function getStepSpec(name: StepName): StepSpec {
  const spec = STEP_SPECS.find((s) => s.name === name);
  if (spec === undefined) {
    throw new Error(`No step spec for "${name}"`);
  }
  return spec;
}
