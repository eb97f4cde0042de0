/**
 * Shared Jest setup file
 *
 * Applies the fast-check settings from propertyTestConfig to every suite.
 */

import './propertyTestConfig';
