export {
  calculateRiskScore,
  getRiskLevel,
  riskSummary,
  riskFactors,
  validationModifier,
  pathModifier,
  exposureModifier,
  historyModifier,
  categoryModifier,
  BASE_RISK_SCORES,
  DEFAULT_BASE_SCORE,
  PATH_RISK_MULTIPLIERS,
  RISK_LEVEL_THRESHOLDS,
} from './score.js';
