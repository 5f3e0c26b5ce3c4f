/**
 * Agenda selection
 * Structural signatures, the canonical order and the per-day cap
 */

import type { Agenda, SelectedAgenda } from '../types/index.js';

/**
 * Structural signature: the ordered (person, start, end) triples
 */
export function agendaSignature(agenda: Agenda): string {
  return agenda.legs
    .map(leg => `${leg.person}@${leg.start.toMillis()}-${leg.end.toMillis()}`)
    .join('|');
}

function firstStartMillis(agenda: Agenda): number {
  return agenda.legs[0]?.start.toMillis() ?? 0;
}

export function lastEndMillis(agenda: Agenda): number {
  return agenda.legs[agenda.legs.length - 1]?.end.toMillis() ?? 0;
}

function personSequence(agenda: Agenda): string {
  return agenda.legs.map(leg => leg.person).join('\u0000');
}

/**
 * Canonical order: first-leg start, then last-leg end, then person order
 */
export function compareAgendas(a: Agenda, b: Agenda): number {
  const byStart = firstStartMillis(a) - firstStartMillis(b);
  if (byStart !== 0) return byStart;

  const byEnd = lastEndMillis(a) - lastEndMillis(b);
  if (byEnd !== 0) return byEnd;

  const sequenceA = personSequence(a);
  const sequenceB = personSequence(b);
  return sequenceA < sequenceB ? -1 : sequenceA > sequenceB ? 1 : 0;
}

/**
 * Agenda with the latest last-leg end; ties go to the canonically later agenda
 */
export function pickLatest(candidates: readonly Agenda[]): Agenda | null {
  let latest: Agenda | null = null;
  for (const agenda of [...candidates].sort(compareAgendas)) {
    if (!latest || lastEndMillis(agenda) >= lastEndMillis(latest)) {
      latest = agenda;
    }
  }
  return latest;
}

/**
 * Keep the earliest agenda, the one ending latest, then fill in canonical order.
 * The result is returned in canonical order.
 */
export function selectSpread(candidates: readonly Agenda[], maxAgendas: number): SelectedAgenda[] {
  if (candidates.length === 0 || maxAgendas <= 0) return [];

  const sorted = [...candidates].sort(compareAgendas);
  const reasons = new Map<Agenda, SelectedAgenda['reason']>();

  const earliest = sorted[0];
  if (!earliest) return [];
  reasons.set(earliest, 'earliest');

  if (maxAgendas >= 2 && sorted.length > 1) {
    const latest = pickLatest(sorted);
    if (latest && latest !== earliest) {
      reasons.set(latest, 'latest');
    }
  }

  for (const agenda of sorted) {
    if (reasons.size >= maxAgendas) break;
    if (!reasons.has(agenda)) {
      reasons.set(agenda, 'filler');
    }
  }

  const selected: SelectedAgenda[] = [];
  for (const agenda of sorted) {
    const reason = reasons.get(agenda);
    if (reason) {
      selected.push({ ...agenda, reason });
    }
  }
  return selected;
}

/**
 * Keep the earliest and latest agendas, then agendas in the order they were
 * found, up to the cap. The result is returned in canonical order.
 */
export function selectFirstFound(
  earliest: Agenda,
  latest: Agenda | null,
  found: readonly Agenda[],
  maxAgendas: number
): SelectedAgenda[] {
  if (maxAgendas <= 0) return [];

  const selected: SelectedAgenda[] = [{ ...earliest, reason: 'earliest' }];
  const taken = new Set([agendaSignature(earliest)]);

  if (latest && maxAgendas >= 2 && !taken.has(agendaSignature(latest))) {
    selected.push({ ...latest, reason: 'latest' });
    taken.add(agendaSignature(latest));
  }

  for (const agenda of found) {
    if (selected.length >= maxAgendas) break;
    const signature = agendaSignature(agenda);
    if (taken.has(signature)) continue;
    taken.add(signature);
    selected.push({ ...agenda, reason: 'first-found' });
  }

  return selected.sort(compareAgendas);
}
