/**
 * Fixed recommendation texts: one template per risk factor plus the general items
 */

import { Priority, RecommendationCategory, RiskFactor } from '../types/core';
import type { SoilSample } from '../types/agronomy';
import type { RecommendationDraft } from '../types/recommendation';

export interface TemplateContext {
  soil: SoilSample | null;
  daysSincePlanting: number;
  maturityDays: number;
  predictedYield: number;
  expectedYield: number;
  deficitPercentage: number;
  confidence: number;
}

export interface RecommendationTemplate {
  category: RecommendationCategory;
  priority: Priority;
  confidence: number;
  title: string;
  describe: (context: TemplateContext) => string;
}

function formatValue(value: number | undefined, unit = ''): string {
  return value === undefined ? 'unknown' : `${value}${unit}`;
}

const ACIDIC_PH_LIMIT = 6.0;

export const RISK_FACTOR_TEMPLATES: Readonly<Record<RiskFactor, RecommendationTemplate>> = {
  [RiskFactor.DROUGHT_STRESS]: {
    category: RecommendationCategory.IRRIGATION,
    priority: Priority.HIGH,
    confidence: 90,
    title: 'Increase Irrigation - Drought Stress Detected',
    describe: () =>
      'Recent rainfall has been below crop demand. Irrigate early in the morning and target 25-30 mm per week until rainfall recovers.',
  },
  [RiskFactor.HEAT_STRESS]: {
    category: RecommendationCategory.CROP_PROTECTION,
    priority: Priority.HIGH,
    confidence: 85,
    title: 'Mitigate Heat Stress',
    describe: () =>
      'Daily maximum temperatures above 35°C were recorded. Shorten the irrigation interval and avoid fertilizer or spray applications during the hottest hours.',
  },
  [RiskFactor.EXCESSIVE_RAINFALL]: {
    category: RecommendationCategory.DRAINAGE,
    priority: Priority.HIGH,
    confidence: 85,
    title: 'Improve Field Drainage',
    describe: () =>
      'Heavy rainfall was recorded this week. Clear drainage channels, open furrows where water stands and scout for fungal disease over the next days.',
  },
  [RiskFactor.PH_IMBALANCE]: {
    category: RecommendationCategory.SOIL_MANAGEMENT,
    priority: Priority.MEDIUM,
    confidence: 85,
    title: 'Correct Soil pH',
    describe: ({ soil }) =>
      soil?.ph !== undefined && soil.ph < ACIDIC_PH_LIMIT
        ? `Soil pH is ${soil.ph}. Apply agricultural lime at 2-4 t/ha to raise it toward the 6.0-7.0 range.`
        : `Soil pH is ${formatValue(soil?.ph)}. Apply elemental sulfur or well-rotted organic matter to bring it down toward the 6.0-7.0 range.`,
  },
  [RiskFactor.NITROGEN_DEFICIENCY]: {
    category: RecommendationCategory.FERTILIZATION,
    priority: Priority.HIGH,
    confidence: 95,
    title: 'Apply Nitrogen Fertilizer',
    describe: ({ soil }) =>
      `Soil nitrogen is ${formatValue(soil?.nitrogen)}, below the level maize needs. Side-dress with urea or CAN at 50-60 kg N/ha, split across two applications.`,
  },
  [RiskFactor.PHOSPHORUS_DEFICIENCY]: {
    category: RecommendationCategory.FERTILIZATION,
    priority: Priority.MEDIUM,
    confidence: 90,
    title: 'Supplement Phosphorus',
    describe: ({ soil }) =>
      `Soil phosphorus is ${formatValue(soil?.phosphorus)}. Band DAP or TSP close to the rows to support root development.`,
  },
  [RiskFactor.SOIL_MOISTURE_LOW]: {
    category: RecommendationCategory.SOIL_MANAGEMENT,
    priority: Priority.MEDIUM,
    confidence: 80,
    title: 'Apply Mulching to Retain Soil Moisture',
    describe: ({ soil }) =>
      `Soil moisture is ${formatValue(soil?.moisture, '%')}. Mulch between rows with crop residue to cut evaporation and schedule irrigation before the next dry spell.`,
  },
  [RiskFactor.LATE_SEASON_STRESS]: {
    category: RecommendationCategory.HARVEST_PLANNING,
    priority: Priority.MEDIUM,
    confidence: 80,
    title: 'Prepare for Harvest',
    describe: ({ daysSincePlanting, maturityDays }) =>
      `The crop is at day ${daysSincePlanting} of a ${maturityDays}-day cycle. Check kernel moisture and black layer formation, and line up labour, storage and drying capacity.`,
  },
};

export const GENERAL_TEMPLATES = {
  emergency: {
    category: RecommendationCategory.EMERGENCY,
    priority: Priority.CRITICAL,
    confidence: 95,
    title: 'Critical Yield Alert - Immediate Action Required',
    describe: ({ predictedYield, expectedYield }: TemplateContext) =>
      `Your predicted yield of ${predictedYield} tons/ha is critically low. Expected yield was ${expectedYield} tons/ha. Immediate intervention needed.`,
  },
  yieldOptimization: {
    category: RecommendationCategory.YIELD_OPTIMIZATION,
    confidence: 85,
    title: 'Yield Below Expected - Enhancement Needed',
    describe: ({ deficitPercentage }: TemplateContext) =>
      `Predicted yield is ${deficitPercentage.toFixed(1)}% below expected. Review irrigation, fertilization and pest control to close the gap.`,
  },
  dataQuality: {
    category: RecommendationCategory.DATA_QUALITY,
    priority: Priority.MEDIUM,
    confidence: 75,
    title: 'Improve Data Quality for Better Predictions',
    describe: ({ confidence }: TemplateContext) =>
      `Prediction confidence is ${confidence}%. Record a recent soil test and keep weather data current to sharpen future predictions.`,
  },
  maintenance: {
    category: RecommendationCategory.MAINTENANCE,
    priority: Priority.LOW,
    confidence: 80,
    title: 'Continue Current Management Practices',
    describe: () =>
      'Your crop is on track. Keep the current irrigation, fertilization and pest management schedule.',
  },
  monitoring: {
    category: RecommendationCategory.MONITORING,
    priority: Priority.LOW,
    confidence: 85,
    title: 'Regular Crop Monitoring',
    describe: () =>
      'Walk the field weekly to check for pests, disease and nutrient symptoms, and record what you see.',
  },
} as const;

export function fromTemplate(template: RecommendationTemplate, context: TemplateContext): RecommendationDraft {
  return {
    category: template.category,
    priority: template.priority,
    confidence: template.confidence,
    title: template.title,
    description: template.describe(context),
  };
}
