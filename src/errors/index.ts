/**
 * Central export for all error classes
 */

export {
  JenkinsTriggerError,
  ConfigurationError,
  ValidationError,
  TransportError,
  getExitCode,
} from '@/jenkins/errors';
