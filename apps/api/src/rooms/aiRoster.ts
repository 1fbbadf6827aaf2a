export type AiPlayer = {
  name: string;
  avatar: string;
};

export const AI_ROSTER: readonly AiPlayer[] = [
  { name: "Alex the Explorer", avatar: "🧭" },
  { name: "Bella the Builder", avatar: "🏗️" },
  { name: "Charlie the Chef", avatar: "👨‍🍳" },
  { name: "Diana the Detective", avatar: "🕵️" }
];

export const pickAiPlayer = (random: () => number = Math.random): AiPlayer => {
  const index = Math.min(Math.floor(random() * AI_ROSTER.length), AI_ROSTER.length - 1);
  return AI_ROSTER[index];
};
