import Joi from 'joi';

export const separationSchema = Joi.object({
  lateralMinimumFeet: Joi.number().positive().required(),
  verticalMinimumFeet: Joi.number().positive().required(),
  longitudinalMinimumFeet: Joi.number().positive().required(),
  crossingMinimumFeet: Joi.number().positive().required(),
  // Near-airport standards may only tighten, never exceed, the nominal ones
  lowAltitudeLateralFeet: Joi.number().positive().max(Joi.ref('lateralMinimumFeet')).required(),
  lowAltitudeVerticalFeet: Joi.number().positive().max(Joi.ref('verticalMinimumFeet')).required()
});

export const performanceSchema = Joi.object({
  maxTurnRateDegPerSec: Joi.number().positive().required(),
  maxClimbRateFpm: Joi.number().positive().required(),
  maxDescentRateFpm: Joi.number().positive().required(),
  maxSpeedChangeKtPerSec: Joi.number().positive().required()
});

export const horizonSchema = Joi.number().positive().required();

export const systemConfigSchema = Joi.object({
  separation: separationSchema.required(),
  prediction: Joi.object({
    horizonSeconds: horizonSchema
  }).required(),
  performance: performanceSchema.required(),
  maneuvers: Joi.object({
    scoring: Joi.string().valid('placeholder', 'predicted').required(),
    protectedZoneMarginFeet: Joi.number().min(0).required()
  }).required(),
  service: Joi.object({
    decisionCycleIntervalMs: Joi.number().integer().min(0).required()
  }).required(),
  logging: Joi.object({
    level: Joi.string().valid('error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly').required(),
    directory: Joi.string().optional()
  }).required()
});

/**
 * Validate a value against a schema, throwing with every failure listed.
 */
export function assertValid(schema: Joi.Schema, value: unknown, context: string): void {
  const { error } = schema.validate(value, { abortEarly: false });
  if (error) {
    throw new Error(`${context} validation failed: ${error.details.map(d => d.message).join(', ')}`);
  }
}
