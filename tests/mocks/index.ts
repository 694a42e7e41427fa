export * from './admin-server.mock';
export * from './prompter.mock';
export * from './admin-api.mock';
export * from './silent-server.mock';
