/**
 * Printer Discovery Module
 *
 * USB enumeration and keyword classification of devices.
 *
 * @module printer/discovery
 */

export type { PrinterDiscovery } from './PrinterDiscovery';
export { deviceKey } from './PrinterDiscovery';

export { USBDiscovery } from './USBDiscovery';

export type { ClassificationRule } from './DeviceClassifier';
export { CLASSIFICATION_RULES, classifyDevice, describeDevice } from './DeviceClassifier';
