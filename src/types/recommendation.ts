/**
 * Recommendation types
 */

import type { IsoDate, IsoTimestamp, Priority, RecommendationCategory } from './core';

export interface RecommendationDraft {
  category: RecommendationCategory;
  title: string;
  description: string;
  priority: Priority;
  confidence?: number;
}

export interface Recommendation extends RecommendationDraft {
  id: string;
  sessionId: string;
  recommendationDate: IsoDate;
  isViewed: boolean;
  isImplemented: boolean;
  createdAt: IsoTimestamp;
}

/**
 * Fields the surrounding CRUD layer may change on a stored recommendation.
 */
export interface RecommendationUpdate {
  isViewed?: boolean;
  isImplemented?: boolean;
}

export interface PredictionAnalysis {
  needsIntervention: boolean;
  criticalityLevel: 1 | 2 | 3 | 4 | 5;
  deficitPercentage: number;
  expectedYield: number;
}

export interface RecommendationAnalysisResult {
  success: boolean;
  errorMessage?: string;
  recommendations: Recommendation[];
  totalRecommendations: number;
  criticalCount: number;
  highPriorityCount: number;
  mediumPriorityCount: number;
  lowPriorityCount: number;
  categorized: Partial<Record<RecommendationCategory, Recommendation[]>>;
  interventionRequired: boolean;
}
