// Names models commonly use, mapped to the key names of the input library.
// Anything not listed is matched case-insensitively against those names.
const KEY_ALIASES: ReadonlyMap<string, string> = new Map(Object.entries({
  ctrl: "LeftControl",
  control: "LeftControl",
  shift: "LeftShift",
  alt: "LeftAlt",
  option: "LeftAlt",
  cmd: "LeftCmd",
  command: "LeftCmd",
  super: "LeftSuper",
  win: "LeftWin",
  meta: "LeftMeta",
  return: "Enter",
  esc: "Escape",
  del: "Delete",
  ins: "Insert",
  pgup: "PageUp",
  pgdn: "PageDown",
  page_up: "PageUp",
  page_down: "PageDown",
  arrowup: "Up",
  arrowdown: "Down",
  arrowleft: "Left",
  arrowright: "Right",
  capslock: "CapsLock",
  caps_lock: "CapsLock",
  printscreen: "Print",
  " ": "Space",
}));

/** Canonical key name for `input`, before the case-insensitive lookup. */
export function normalizeKeyName(input: string): string {
  const lower = input.toLowerCase();
  const alias = KEY_ALIASES.get(lower);
  if (alias) return alias;
  if (/^[0-9]$/.test(lower)) return `Num${lower}`;
  return input;
}

/**
 * Split combined entries such as "ctrl+shift+p" into separate keys. A lone
 * "+" and entries with empty parts ("ctrl++") are kept whole.
 */
export function expandChord(keys: string[]): string[] {
  const expanded: string[] = [];
  for (const key of keys) {
    const parts = key.split("+");
    if (parts.length > 1 && parts.every((part) => part.trim().length > 0)) {
      expanded.push(...parts.map((part) => part.trim()));
    } else {
      expanded.push(key);
    }
  }
  return expanded;
}
