/**
 * Operational log sink. Components take one at construction time;
 * production passes `console`.
 */
export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;
