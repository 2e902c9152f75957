import {Cell, DEFAULT_CONFIG, FirstMover, type GameConfig, type Mark} from '@shared/mod.ts';

export type Env = Readonly<Record<string, string | undefined>>;

function readEnv<T>(env: Env, name: string, parse: (value: string) => T | undefined, fallback: T): T {
    const v = env[name];
    if (v === undefined || v.length === 0) return fallback;

    const parsed = parse(v.trim());
    if (parsed === undefined) throw new Error(`Invalid env var: ${name}=${v}`);
    return parsed;
}

function parseMark(value: string): Mark | undefined {
    switch (value.toUpperCase()) {
        case Cell.X:
            return Cell.X;
        case Cell.O:
            return Cell.O;
        default:
            return undefined;
    }
}

function parseFirstMover(value: string): FirstMover | undefined {
    switch (value.toLowerCase()) {
        case FirstMover.Cpu:
            return FirstMover.Cpu;
        case FirstMover.Human:
            return FirstMover.Human;
        default:
            return undefined;
    }
}

export function loadConfig(env: Env = process.env): GameConfig {
    return {
        cpu: readEnv(env, 'TTT_CPU_MARK', parseMark, DEFAULT_CONFIG.cpu),
        firstMover: readEnv(env, 'TTT_FIRST_MOVER', parseFirstMover, DEFAULT_CONFIG.firstMover),
    };
}
