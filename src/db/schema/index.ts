export { campaignSessions } from './campaign-sessions.js';
