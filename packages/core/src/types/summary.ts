export interface ConsultationSummary {
  symptoms: string;
  diagnosis: string;
  medication: string;
  careAdvice: string;
  model: string;
  /** Seconds spent in the LLM call, rounded to 2 decimals */
  summaryTime: number;
  success: boolean;
  error?: string;
}
