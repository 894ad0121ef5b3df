export { createApp, StudyRunHttpServer } from './http-server.js';
export { createStudyRunRouter, RESULT_DATA_LIMIT } from './routes.js';
export { httpStatusFor, type HttpStatus } from './error-status.js';
export { applyCookieMutations, requestContextFrom } from './cookie-jar.js';
