export * from './ProfileSearcher.js';
export * from './TaskAdmissionService.js';
export * from './MaintenanceService.js';
export * from './AdminAuthorizer.js';
export * from './BatchSearchService.js';
