/**
 * Game Rule Definitions
 * @module data/gameRules
 *
 * Static configuration for every supported game. Seeded into the
 * `game_rules` table when the store is opened and read-only afterwards.
 */

import type { GameRule } from "../types/models.js";

const LOTTO_649_ODDS: Record<string, string> = {
  "6/6": "One in 13,983,816",
  "5/6+": "One in 2,330,636",
  "5/6": "One in 55,492",
  "4/6": "One in 1,033",
  "3/6": "One in 56.7",
  "2/6+": "One in 81.2",
  "2/6": "One in 8.3",
  "Any Prize": "One in 6.6",
};

export const GAME_RULES: readonly GameRule[] = [
  {
    gameName: "lotto649",
    totalNumbers: 49,
    regularBallsDrawn: 6,
    bonusBallPool: 49,
    bonusBallsDrawn: 1,
    drawSchedule: "Wed 20:30 America/Edmonton,Sat 20:30 America/Edmonton",
    prizeTierFormat: "matches/6+",
    officialOdds: LOTTO_649_ODDS,
  },
  {
    gameName: "LottoMax",
    totalNumbers: 50,
    regularBallsDrawn: 7,
    bonusBallPool: 50,
    bonusBallsDrawn: 1,
    drawSchedule: "Tue 20:30 America/Edmonton,Fri 20:30 America/Edmonton",
    prizeTierFormat: "matches/7+",
    officialOdds: {},
  },
  {
    gameName: "DailyGrand",
    totalNumbers: 49,
    regularBallsDrawn: 5,
    bonusBallPool: 7,
    bonusBallsDrawn: 1,
    drawSchedule: "Mon 20:30 America/Edmonton,Thu 20:30 America/Edmonton",
    prizeTierFormat: "matches/5 + GN/1",
    officialOdds: {},
  },
];
