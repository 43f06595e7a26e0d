import type { Extension, Menu } from '../extensions/types.js';

/**
 * Where the user is. Transitions return new values; nothing mutates a state
 * in place.
 */
export type NavigationState =
    | { kind: 'main' }
    | {
          kind: 'extension';
          extension: Extension;
          /** stack[0] is the extension's root menu, the last entry the current one */
          stack: readonly Menu[];
      };

export const MAIN_MENU: NavigationState = { kind: 'main' };

export function enterExtension(extension: Extension): NavigationState {
    return { kind: 'extension', extension, stack: [extension.program.menu] };
}

export function pushMenu(state: NavigationState, menu: Menu): NavigationState {
    if (state.kind === 'main') return state;
    return { ...state, stack: [...state.stack, menu] };
}

/**
 * One level up; leaving the root menu returns to the main menu
 */
export function popMenu(state: NavigationState): NavigationState {
    if (state.kind === 'main') return state;
    if (state.stack.length <= 1) return MAIN_MENU;
    return { ...state, stack: state.stack.slice(0, -1) };
}

export function currentMenu(state: NavigationState): Menu | null {
    if (state.kind === 'main') return null;
    return state.stack[state.stack.length - 1];
}

/**
 * 0 at an extension's root menu, -1 at the main menu
 */
export function depth(state: NavigationState): number {
    return state.kind === 'main' ? -1 : state.stack.length - 1;
}
