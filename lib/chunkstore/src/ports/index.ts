// Ports - interfaces for host-provided services

// Logging ports
export * from './logging';
