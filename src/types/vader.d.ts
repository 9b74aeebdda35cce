declare module 'vader-sentiment' {
  export interface PolarityScores {
    compound: number;
    pos: number;
    neu: number;
    neg: number;
  }

  export class SentimentIntensityAnalyzer {
    static polarity_scores(text: string): PolarityScores;
  }

  const vader: {
    SentimentIntensityAnalyzer: typeof SentimentIntensityAnalyzer;
  };
  export default vader;
}
