export { makeLoginHandler } from './login.js';
export { makeCallbackHandler } from './callback.js';
export { makeShowDataHandler } from './show-data.js';
