/**
 * ZPL Module
 *
 * Provides ZPL format generation and label templates.
 *
 * @module printer/services/zpl
 */

export * from './ZplBuilder';
export * as ZplTemplates from './LabelTemplates';
