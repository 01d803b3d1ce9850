export { scanCommand } from './scan_command';
export { generateCommand, generateLibraryCommand } from './generate_command';
export { rewriteCommand } from './rewrite_command';
export { migrateCommand } from './migrate_command';
