export {
  ClassificationService,
  type AuditSink,
  type ClassifyOptions,
  type ServiceDependencies
} from './classification-service.js';
export { renderReport, renderEscalation } from './render.js';
