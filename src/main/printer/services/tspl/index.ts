/**
 * TSPL Module
 *
 * Provides TSPL statement generation and label templates.
 *
 * @module printer/services/tspl
 */

export * from './TsplBuilder';
export * as TsplTemplates from './LabelTemplates';
