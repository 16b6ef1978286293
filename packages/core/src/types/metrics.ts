export interface ErrorRates {
  wer: number;
  cer: number;
  refChars: number;
  hypChars: number;
  refWords: number;
  hypWords: number;
  substitutions: number;
  deletions: number;
  insertions: number;
}

export interface QualityMetrics {
  avgConfidence: number;
  minConfidence: number;
  lowConfidenceRatio: number;
  silenceRatio: number;
  audioRmsEnergy: number;
  clippingDetected: boolean;
  wordCount: number;
}
