import type { FactItem, FactsWindow, MatchesSnapshot, MatchesWindow, MatchItem } from '@feedwire/sdk';
import { paint } from './terminal';

export type AnyMatchesWindow = MatchesSnapshot | MatchesWindow;

function cursorLabel(window: { cursorUpdatedUtc: string; cursorId: number }): string {
  return `${window.cursorUpdatedUtc || '-'}#${window.cursorId}`;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function renderFact(item: FactItem, color: boolean): string {
  const status = item.status === 'ok' ? paint(item.status, 'green', color) : paint(item.status || '?', 'yellow', color);
  const review = item.reviewStatus ? paint(` (review: ${item.reviewStatus})`, 'dim', color) : '';
  return `  #${item.id} [${status}] ${item.factText}${review}`;
}

export function renderFactsWindow(label: string, window: FactsWindow, color: boolean): string[] {
  const header = `${paint(label, 'bold', color)} ${window.proId || '-'} cursor ${cursorLabel(window)} ${paint(
    `(${plural(window.items.length, 'item')})`,
    'dim',
    color
  )}`;
  return [header, ...window.items.map((item) => renderFact(item, color))];
}

export function renderMatch(item: MatchItem, color: boolean): string {
  const score = paint(item.score.toFixed(2), 'blue', color);
  const rationale = item.rationale ? ` ${paint(item.rationale, 'dim', color)}` : '';
  return `  #${item.id} ${item.direction || '-'} -> ${item.targetProId || '-'} score ${score}${rationale}`;
}

export function renderMatchesWindow(label: string, window: AnyMatchesWindow, color: boolean): string[] {
  const direction = window.direction ?? 'both';
  const header = `${paint(label, 'bold', color)} ${window.proId || '-'} ${direction} cursor ${cursorLabel(
    window
  )} ${paint(`(${plural(window.items.length, 'item')})`, 'dim', color)}`;
  return [header, ...window.items.map((item) => renderMatch(item, color))];
}
