export { createPopulationReader } from './readers/PopulationReader.js';
export type { PopulationEntry, PopulationColumns } from './readers/PopulationReader.js';
export { createPropertyReader } from './readers/PropertyReader.js';
export type { PropertyEntry, PropertyColumns } from './readers/PropertyReader.js';
export { createServiceRequestReader } from './readers/ServiceRequestReader.js';
export type { ServiceRequest, ServiceRequestStatus, ServiceRequestColumns } from './readers/ServiceRequestReader.js';
export { readZipCode } from './readers/zipCode.js';
