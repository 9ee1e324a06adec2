export { createEvaluateCommand } from './evaluate';
export { createCredentialsCommand } from './credentials';
export { createServeCommand, parsePort } from './serve';
