/**
 * TVM802 Export - Configuration
 *
 * Centralized configuration management with environment variable support
 */

import { z } from 'zod';

const ConfigSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  toolName: z.string().default('tvm802-export'),

  // Placeholder values written into a fresh feeders template
  template: z.object({
    nozzle: z.string().default('1/2'),
    speed: z.string().default('100'),
    height: z.string().default('0.5'),
  }),

  // Fallbacks applied to machine rows whose feeder entry leaves a field blank
  machine: z.object({
    nozzle: z.string().min(1).default('1'),
    speed: z.string().min(1).default('100'),
    height: z.string().min(1).default('0'),
  }),

  output: z.object({
    machineFileName: z.string().default('tvm802-machine.csv'),
    templateFileName: z.string().default('feeders-unconfigged.csv'),
  }),

  requireBomForPositions: z.boolean().default(false),
});

export type Config = z.infer<typeof ConfigSchema>;

function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV || 'development',
    logLevel: process.env.LOG_LEVEL || 'info',
    toolName: process.env.TVM802_EXPORT_NAME || 'tvm802-export',

    template: {
      nozzle: process.env.TEMPLATE_NOZZLE || '1/2',
      speed: process.env.TEMPLATE_SPEED || '100',
      height: process.env.TEMPLATE_HEIGHT || '0.5',
    },

    machine: {
      nozzle: process.env.MACHINE_DEFAULT_NOZZLE || '1',
      speed: process.env.MACHINE_DEFAULT_SPEED || '100',
      height: process.env.MACHINE_DEFAULT_HEIGHT || '0',
    },

    output: {
      machineFileName: process.env.MACHINE_OUTPUT_NAME || 'tvm802-machine.csv',
      templateFileName: process.env.TEMPLATE_OUTPUT_NAME || 'feeders-unconfigged.csv',
    },

    requireBomForPositions: process.env.REQUIRE_BOM_FOR_POSITIONS === 'true',
  };

  return ConfigSchema.parse(rawConfig);
}

export const config = loadConfig();

export function getConfig(): Config {
  return config;
}
