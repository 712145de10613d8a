/**
 * Layout carry-over
 *
 * Encoding an entity builds a fresh tree with no recorded whitespace and no original
 * atom text. Before writing, the fresh tree borrows both from the tree that was read,
 * wherever the two still agree, so unmodified content is written back byte for byte
 * and only edited values fall back to canonical formatting.
 */

import { keywordOf } from './nodeAccessor';
import { isAtom, isList, isNumberAtom, type SExpr, type SExprAtom, type SExprDocument, type SExprList } from './sexpr';

/** Source atom to reuse in place of `fresh`, when both denote the same value */
function matchingAtom(fresh: SExprAtom, source: SExprAtom): SExprAtom | undefined {
  if (isNumberAtom(fresh)) {
    return isNumberAtom(source) && source.value === fresh.value ? source : undefined;
  }
  if (isNumberAtom(source)) return undefined;
  return source.value === fresh.value ? source : undefined;
}

function pairItems(target: SExprList, index: number, source: SExpr, pending: Array<[SExprList, SExprList]>): void {
  const item = target.items[index];
  if (isList(item)) {
    if (isList(source) && keywordOf(source) === keywordOf(item)) pending.push([item, source]);
  } else if (isAtom(source)) {
    const reused = matchingAtom(item, source);
    if (reused) target.items[index] = reused;
  }
}

/** Pair children of two lists of different length, keeping source order */
function alignItems(target: SExprList, source: SExprList, pending: Array<[SExprList, SExprList]>): void {
  let next = 0;
  for (let i = 0; i < target.items.length; i++) {
    const item = target.items[i];
    if (isList(item)) {
      const keyword = keywordOf(item);
      for (let k = next; k < source.items.length; k++) {
        const candidate = source.items[k];
        if (isList(candidate) && keywordOf(candidate) === keyword) {
          pending.push([item, candidate]);
          next = k + 1;
          break;
        }
      }
    } else if (next < source.items.length && isAtom(source.items[next])) {
      pairItems(target, i, source.items[next], pending);
      next++;
    }
  }
}

/** Copy recorded whitespace and atom text from `original` onto `fresh`, in place */
export function carryLayout(fresh: SExprList, original: SExprList): void {
  const pending: Array<[SExprList, SExprList]> = [[fresh, original]];

  while (pending.length > 0) {
    const pair = pending.pop();
    if (!pair) break;
    const [target, source] = pair;

    if (target.items.length !== source.items.length) {
      alignItems(target, source, pending);
      continue;
    }
    if (source.layout) {
      target.layout = { gaps: [...source.layout.gaps] };
    }
    for (let i = 0; i < target.items.length; i++) {
      pairItems(target, i, source.items[i], pending);
    }
  }
}

/**
 * Carry layout form by form. Each fresh form keeps the gap in front of the original it
 * matches, comment lines included; new forms start on a line of their own.
 */
export function carryDocumentLayout(fresh: SExprDocument, original: SExprDocument): void {
  const sourceGaps = original.layout?.gaps;
  const gaps: string[] = [];
  let next = 0;
  for (const form of fresh.forms) {
    const keyword = keywordOf(form);
    let gap = gaps.length === 0 ? '' : '\n';
    for (let k = next; k < original.forms.length; k++) {
      if (keywordOf(original.forms[k]) === keyword) {
        carryLayout(form, original.forms[k]);
        if (sourceGaps) gap = sourceGaps[k];
        next = k + 1;
        break;
      }
    }
    gaps.push(gap);
  }
  if (sourceGaps && sourceGaps.length === original.forms.length + 1) {
    gaps.push(sourceGaps[original.forms.length]);
    fresh.layout = { gaps };
  }
}
