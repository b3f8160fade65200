export interface TextEdit {
  /** Characters to erase before the cursor. */
  backspaces: number;
  insert: string;
}

/**
 * Tracks the text typed for the current utterance and turns each new
 * transcript into the smallest erase-then-type edit at the cursor.
 *
 * Lengths are counted in code points: one backspace removes one character.
 */
export class PartialReconciler {
  private displayed: string[] = [];

  get text(): string {
    return this.displayed.join('');
  }

  applyPartial(text: string): TextEdit | null {
    const next = Array.from(text.trim());
    if (next.length === 0) return null;

    const edit = diff(this.displayed, next);
    this.displayed = next;
    return edit;
  }

  applyFinal(text: string): TextEdit | null {
    const next = Array.from(text.trim());
    if (next.length === 0) return null;

    const edit = diff(this.displayed, next);
    this.displayed = [];
    return edit;
  }

  discard(): TextEdit | null {
    const count = this.displayed.length;
    this.displayed = [];
    return count > 0 ? { backspaces: count, insert: '' } : null;
  }

  reset(): void {
    this.displayed = [];
  }
}

function diff(current: string[], next: string[]): TextEdit | null {
  let prefix = 0;
  const limit = Math.min(current.length, next.length);
  while (prefix < limit && current[prefix] === next[prefix]) {
    prefix++;
  }

  const backspaces = current.length - prefix;
  const insert = next.slice(prefix).join('');
  if (backspaces === 0 && insert.length === 0) return null;
  return { backspaces, insert };
}
