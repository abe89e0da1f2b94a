// Control signals a command handler returns to its router

export const ControlSignal = {
  CONTINUE: 'continue',
  EXIT_MENU: 'exit-menu',
  EXIT_PROGRAM: 'exit-program',
} as const;

export type ControlSignal = (typeof ControlSignal)[keyof typeof ControlSignal];

/** The signals that end a `run()` loop */
export type ExitSignal = Exclude<ControlSignal, 'continue'>;

export function isExitSignal(signal: ControlSignal): signal is ExitSignal {
  return signal !== ControlSignal.CONTINUE;
}
