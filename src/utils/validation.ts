import Joi from 'joi';
import { ServerPublicStatus, ServerStats, ValidationError } from '../models';
import { LogContext, logger } from './logger';

/**
 * Validation result interface
 */
export interface ValidationResult<T> {
  isValid: boolean;
  data?: T;
  errors?: ValidationError[];
}

/**
 * Crafty section of the configuration document, as written in YAML
 */
export interface RawCraftySection {
  base_url: string;
  api_prefix: string;
  username?: string;
  password?: string;
  bearer_token?: string;
  verify_ssl: boolean;
  request_timeout: number;
}

/**
 * Configuration document, as written in YAML
 */
export interface RawBotConfig {
  update_interval: number;
  channel_cooldown: number;
  category_name: string;
  allowed_user_ids: Array<string | number>;
  allowed_role_names: string[];
  servers: Record<string, string | number>;
  discord_token?: string;
  crafty: RawCraftySection;
}

/**
 * Server entry of GET /servers before normalisation
 */
export interface RawServerEntry {
  server_id: string | number;
  server_name: string;
  running?: boolean;
  online?: number;
  max?: number;
}

const stringOrNumber = Joi.alternatives().try(Joi.string(), Joi.number());

const craftySection = Joi.object<RawCraftySection>({
  base_url: Joi.string().uri({ scheme: ['http', 'https'] }).required(),
  api_prefix: Joi.string().pattern(/^\//).default('/api/v2'),
  username: Joi.string(),
  password: Joi.string(),
  bearer_token: Joi.string(),
  verify_ssl: Joi.boolean().default(true),
  request_timeout: Joi.number().positive().max(300).default(15)
})
  .or('bearer_token', 'username')
  .with('username', 'password')
  .messages({
    'object.missing': 'crafty needs either bearer_token or username/password'
  });

/**
 * Common validation schemas
 */
export const ValidationSchemas = {
  botConfig: Joi.object<RawBotConfig>({
    update_interval: Joi.number().integer().min(1).default(60),
    channel_cooldown: Joi.number().min(0).default(15),
    category_name: Joi.string().min(1).max(100).default('Crafty Servers'),
    allowed_user_ids: Joi.array().items(stringOrNumber).default([]),
    allowed_role_names: Joi.array().items(Joi.string()).default([]),
    servers: Joi.object().pattern(Joi.string(), stringOrNumber).default({}),
    discord_token: Joi.string().allow(''),
    crafty: craftySection.required()
  }),

  serverList: Joi.object<{ data: RawServerEntry[] }>({
    data: Joi.array().items(
      Joi.object<RawServerEntry>({
        server_id: stringOrNumber.required(),
        server_name: Joi.string().allow('').required(),
        running: Joi.boolean(),
        online: Joi.number(),
        max: Joi.number()
      })
    ).default([])
  }),

  publicStatus: Joi.object<{ data: ServerPublicStatus }>({
    data: Joi.object<ServerPublicStatus>({
      running: Joi.boolean(),
      online: Joi.number(),
      max: Joi.number()
    }).default({})
  }),

  stats: Joi.object<{ data: ServerStats }>({
    data: Joi.object<ServerStats>({
      running: Joi.boolean().default(false)
    }).default({ running: false })
  })
};

/**
 * Validation utility class
 */
export class ValidationUtils {
  /**
   * Validate data against a Joi schema
   */
  static validate<T>(
    data: unknown,
    schema: Joi.Schema<T>,
    context?: LogContext
  ): ValidationResult<T> {
    const { error, value } = schema.validate(data, {
      abortEarly: false,
      stripUnknown: true,
      convert: true
    });

    if (error) {
      const validationErrors: ValidationError[] = error.details.map(detail => ({
        field: detail.path.join('.'),
        rule: detail.type,
        message: detail.message,
        value: detail.context?.value
      }));

      validationErrors.forEach(validationError => {
        logger.validationError(
          validationError.field,
          validationError.rule,
          validationError.value,
          context
        );
      });

      return {
        isValid: false,
        errors: validationErrors
      };
    }

    return {
      isValid: true,
      data: value
    };
  }

  /**
   * Validate the YAML configuration document
   */
  static validateBotConfig(config: unknown, context?: LogContext): ValidationResult<RawBotConfig> {
    return this.validate(config, ValidationSchemas.botConfig, {
      ...context,
      operation: 'validate_bot_config'
    });
  }
}
