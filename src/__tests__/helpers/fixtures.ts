/**
 * Test Fixtures — Upstream Payloads
 * Layer: Test Helpers
 *
 * OpenLigaDB-shaped JSON as the provider would receive it. Team and league
 * names are made up; the field names and nesting follow the real API.
 */

export const leaguesPayload = [
  {
    leagueId: 4741,
    leagueName: 'Test Premier Division',
    leagueShortcut: 'tpd',
    leagueSeason: '2024',
    country: 'Testland',
    sport: { sportId: 1, sportName: 'Fußball' },
  },
  {
    leagueId: 4742,
    leagueName: 'Test Second Division',
    leagueShortcut: 'tsd',
    leagueSeason: '2024',
    country: 'Testland',
  },
];

export const homeTeam = {
  teamId: 40,
  teamName: 'Test City FC',
  shortName: 'Test City',
  teamIconUrl: 'https://img.example.test/40.png',
  teamGroupName: null,
};

export const awayTeam = {
  teamId: 87,
  teamName: 'Sample United',
  shortName: 'Sample',
  teamIconUrl: null,
};

/** Finished match: half-time result first, final result last. */
export const finishedMatch = {
  matchID: 70001,
  matchDateTime: '2024-08-23T20:30:00',
  leagueName: 'Test Premier Division 2024/2025',
  leagueShortcut: 'tpd',
  team1: homeTeam,
  team2: awayTeam,
  matchIsFinished: true,
  matchResults: [
    { resultID: 1, resultName: 'Halbzeit', pointsTeam1: 1, pointsTeam2: 0 },
    { resultID: 2, resultName: 'Endergebnis', pointsTeam1: 3, pointsTeam2: 1 },
  ],
};

/** Kicked off, not finished: a result exists but matchIsFinished is false. */
export const liveMatch = {
  matchID: 70002,
  matchDateTime: '2024-08-24T15:30:00',
  leagueName: 'Test Premier Division 2024/2025',
  team1: awayTeam,
  team2: homeTeam,
  matchIsFinished: false,
  matchResults: [{ resultID: 1, resultName: 'Halbzeit', pointsTeam1: 0, pointsTeam2: 2 }],
};

/** Not started: no results at all. */
export const scheduledMatch = {
  matchID: 70003,
  matchDateTime: '2024-08-31T18:30:00',
  leagueName: 'Test Premier Division 2024/2025',
  team1: homeTeam,
  team2: awayTeam,
  matchIsFinished: false,
  matchResults: [],
};
