import { GAME_MODE } from "../core/command.js";

export const EXPLORING = [GAME_MODE.EXPLORING] as const;
export const IN_COMBAT = [GAME_MODE.IN_COMBAT] as const;
export const ANY_PLAY_MODE = [GAME_MODE.EXPLORING, GAME_MODE.IN_COMBAT] as const;
