export interface KeyState {
  isHeld(code: string): boolean;
  consumePressed(code: string): boolean;
}

const BLOCKED_DEFAULTS = [
  'ArrowUp',
  'ArrowDown',
  'ArrowLeft',
  'ArrowRight',
  'Space',
];

export class Keyboard implements KeyState {
  private held = new Set<string>();
  private pressed = new Set<string>(); // went down since last consume

  constructor(target: Window = window) {
    target.addEventListener('keydown', (e) => {
      if (isTypingTarget(e)) return;
      const code = e.code;
      if (!this.held.has(code)) {
        this.pressed.add(code);
      }
      this.held.add(code);

      if (BLOCKED_DEFAULTS.includes(code)) e.preventDefault();
    });

    target.addEventListener('keyup', (e) => {
      this.held.delete(e.code);
    });

    target.addEventListener('blur', () => {
      this.held.clear();
      this.pressed.clear();
    });
  }

  isHeld(code: string): boolean {
    return this.held.has(code);
  }

  consumePressed(code: string): boolean {
    return this.pressed.delete(code);
  }
}

function isTypingTarget(e: KeyboardEvent): boolean {
  const target = e.target;
  if (!(target instanceof HTMLElement)) return false;
  if (target.isContentEditable) return true;
  const tag = target.tagName;
  return tag === 'INPUT' || tag === 'TEXTAREA' || tag === 'SELECT';
}
