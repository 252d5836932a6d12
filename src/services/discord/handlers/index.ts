export { setupEventHandlers, initializeGuild } from './EventHandler.js';
