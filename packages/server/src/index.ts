/**
 * @docdesk/server
 *
 * Application wiring. The runnable entry point is main.ts.
 */

export { createApplication, type Application, type ApplicationOptions } from './application.js';
