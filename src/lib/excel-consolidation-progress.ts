import type { ConsolidationPhase, ProgressEvent } from './excel-types';

export const PHASE_ORDER: readonly ConsolidationPhase[] = ['validation', 'clearing', 'processing', 'saving'];

/** Percent of the overall run each phase accounts for. */
export const PHASE_WEIGHTS: Readonly<Record<ConsolidationPhase, number>> = {
  validation: 10,
  clearing: 10,
  processing: 70,
  saving: 10,
};

/**
 * Maps a progress event onto one 0-100 scale spanning all phases:
 * the weights of the phases before the event's phase, plus the completed share of its own.
 */
export function overallProgress(event: ProgressEvent): number {
  const phaseIndex = PHASE_ORDER.indexOf(event.phase);
  const completed = PHASE_ORDER.slice(0, phaseIndex).reduce((sum, phase) => sum + PHASE_WEIGHTS[phase], 0);

  if (event.total <= 0) return completed;
  const fraction = Math.min(Math.max(event.current / event.total, 0), 1);
  return completed + fraction * PHASE_WEIGHTS[event.phase];
}

export function formatProgressEvent(event: ProgressEvent): string {
  return `${overallProgress(event).toFixed(0).padStart(3)}% [${event.phase.toUpperCase()}] ${event.message}`;
}
