export interface CharacterProfile {
  key: string;
  show: string;
  /** Names the character is credited or addressed by, most specific last */
  names: string[];
  /** Words other characters use when talking to or about them */
  contextClues: string[];
}

export const TARGET_CHARACTERS: CharacterProfile[] = [
  {
    key: "tywin_lannister",
    show: "Game of Thrones",
    names: ["Tywin", "Lord Tywin", "Tywin Lannister", "Lord Lannister"],
    contextClues: ["Father", "my lord"]
  },
  {
    key: "chuck_mcgill",
    show: "Better Call Saul",
    names: ["Chuck", "Charles McGill", "Charles", "McGill"],
    contextClues: ["Brother", "HHM"]
  },
  {
    key: "general_partagaz",
    show: "Andor",
    names: ["Partagaz", "Major Partagaz", "General"],
    contextClues: ["General", "Sir"]
  },
  {
    key: "logan_roy",
    show: "Succession",
    names: ["Logan", "Logan Roy", "Mr. Roy"],
    contextClues: ["Dad", "Father", "Pop"]
  }
];

/** Character used by `extract --test` */
export const TEST_CHARACTER = {
  key: "tywin_lannister",
  show: "Game of Thrones"
} as const;
