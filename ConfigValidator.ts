/**
 * Protocol Config Validator
 *
 * JSON schema validation of the resolved configuration using ajv,
 * followed by the cross-field checks a schema cannot express.
 */

import Ajv, { ValidateFunction, ErrorObject } from 'ajv';
import { ILogger } from './utils/ILogger';
import { ProtocolConfig } from './ProtocolConfig';
import { REGISTRABLE_USER_TYPES, POOL_TYPES } from './types';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const nonNegativeInteger = { type: 'integer', minimum: 0 };
const positiveInteger = { type: 'integer', minimum: 1 };

const thresholdTable = {
  type: 'array',
  items: nonNegativeInteger,
  minItems: 7,
  maxItems: 7,
};

const populationPolicy = {
  oneOf: [
    {
      type: 'object',
      properties: { kind: { const: 'unlimited' } },
      required: ['kind'],
      additionalProperties: false,
    },
    {
      type: 'object',
      properties: { kind: { const: 'fixed' }, max: nonNegativeInteger },
      required: ['kind', 'max'],
      additionalProperties: false,
    },
    {
      type: 'object',
      properties: {
        kind: { const: 'proportional' },
        ratio: { type: 'number', exclusiveMinimum: 0 },
        direction: { enum: ['direct', 'inverse'] },
      },
      required: ['kind', 'ratio', 'direction'],
      additionalProperties: false,
    },
  ],
};

const userTypeConfig = {
  type: 'object',
  properties: {
    population: populationPolicy,
    requiresInvitation: { type: 'boolean' },
    invitationDelayBlocks: nonNegativeInteger,
    invitableBy: {
      type: 'array',
      items: { enum: [...REGISTRABLE_USER_TYPES] },
      uniqueItems: true,
    },
  },
  required: ['population', 'requiresInvitation', 'invitationDelayBlocks', 'invitableBy'],
  additionalProperties: false,
};

function recordOf(keys: readonly string[], valueSchema: object): object {
  return {
    type: 'object',
    properties: Object.fromEntries(keys.map((key) => [key, valueSchema])),
    required: [...keys],
    additionalProperties: false,
  };
}

function objectOf(properties: Record<string, object>): object {
  return {
    type: 'object',
    properties,
    required: Object.keys(properties),
    additionalProperties: false,
  };
}

export const PROTOCOL_CONFIG_SCHEMA = objectOf({
  deployBlock: nonNegativeInteger,
  blocksPerEra: positiveInteger,
  halving: positiveInteger,
  eraFractionPrecision: positiveInteger,
  logLevel: { enum: ['debug', 'info', 'warn', 'error'] },
  pools: recordOf(POOL_TYPES, objectOf({
    totalTokens: { type: 'string', pattern: '^[0-9]+$' },
  })),
  community: objectOf({
    bootstrapThreshold: nonNegativeInteger,
    maxInviterPenalties: positiveInteger,
    invitationTtlBlocks: nonNegativeInteger,
    types: recordOf(REGISTRABLE_USER_TYPES, userTypeConfig),
  }),
  inspection: objectOf({
    interInspectionDelayBlocks: nonNegativeInteger,
    inspectionDeadlineBlocks: positiveInteger,
    requestCooldownBlocks: nonNegativeInteger,
    maxGiveUps: positiveInteger,
    minArea: nonNegativeInteger,
    maxArea: positiveInteger,
    maxInspections: positiveInteger,
    minInspectionsToEnterPool: positiveInteger,
    maxTreesResult: positiveInteger,
    maxBiodiversityResult: positiveInteger,
    treeThresholds: thresholdTable,
    biodiversityThresholds: thresholdTable,
  }),
  governance: objectOf({
    safeguardBlocks: nonNegativeInteger,
    voteIntervalBlocks: nonNegativeInteger,
    pointsPerLevel: positiveInteger,
    maxPenalties: positiveInteger,
    invalidationVoteDivisor: positiveInteger,
  }),
  contributions: objectOf({
    submissionDelayBlocks: recordOf(['report', 'research', 'contribution'], nonNegativeInteger),
  }),
  text: objectOf({
    maxNameLength: positiveInteger,
    maxHashLength: positiveInteger,
    maxTitleLength: positiveInteger,
    maxDescriptionLength: positiveInteger,
    maxJustificationLength: positiveInteger,
  }),
});

export class ConfigValidator {
  private ajv: Ajv;
  private logger: ILogger;
  private validateSchema: ValidateFunction;

  constructor(logger: ILogger) {
    this.logger = logger;
    this.ajv = new Ajv({
      allErrors: true, // Collect all errors, not just the first one
      strict: true,
      coerceTypes: false,
      useDefaults: false,
    });
    this.validateSchema = this.ajv.compile(PROTOCOL_CONFIG_SCHEMA);
  }

  /**
   * Validate a resolved configuration
   */
  validate(config: ProtocolConfig): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!this.validateSchema(config)) {
      errors.push(...this.formatErrors(this.validateSchema.errors ?? []));
      this.logger.warn('Protocol config failed schema validation', {
        errorCount: errors.length,
        errors,
      });
      // Cross-field checks assume a well-formed config
      return { valid: false, errors, warnings };
    }

    errors.push(...this.checkLogicalConsistency(config, warnings));

    if (errors.length === 0) {
      this.logger.debug('Protocol config validation passed', { warnings });
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
    };
  }

  private checkLogicalConsistency(config: ProtocolConfig, warnings: string[]): string[] {
    const errors: string[] = [];
    const { inspection, governance } = config;

    if (inspection.minArea > inspection.maxArea) {
      errors.push(`inspection.minArea (${inspection.minArea}) exceeds maxArea (${inspection.maxArea})`);
    }

    if (inspection.minInspectionsToEnterPool > inspection.maxInspections) {
      errors.push('inspection.minInspectionsToEnterPool cannot exceed maxInspections');
    }

    for (const key of ['treeThresholds', 'biodiversityThresholds'] as const) {
      const table = inspection[key];
      if (table[0] !== 0) {
        errors.push(`inspection.${key} must start at 0`);
      }
      for (let i = 1; i < table.length; i++) {
        if (table[i] <= table[i - 1]) {
          errors.push(`inspection.${key} must be strictly ascending (index ${i})`);
        }
      }
    }

    if (governance.safeguardBlocks >= config.blocksPerEra) {
      errors.push('governance.safeguardBlocks must be shorter than an era');
    }

    if (inspection.inspectionDeadlineBlocks < inspection.interInspectionDelayBlocks) {
      warnings.push('inspection deadline is shorter than the inter-inspection delay');
    }

    for (const [poolType, pool] of Object.entries(config.pools)) {
      if (BigInt(pool.totalTokens) === 0n) {
        warnings.push(`pool ${poolType} has no tokens to distribute`);
      }
    }

    return errors;
  }

  /**
   * Format validation errors for readability
   */
  private formatErrors(errors: ErrorObject[]): string[] {
    return errors.map((error) => {
      const path = error.instancePath || 'root';
      const message = error.message || 'Validation error';
      return `${path}: ${message}`;
    });
  }
}
