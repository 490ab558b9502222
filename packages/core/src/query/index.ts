export { findUpcoming, findOverdue, nextTaskRecord, minutesUntil } from './upcoming.js';
