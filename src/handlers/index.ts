// Export all handlers from their respective files
export * from './edit-handlers.js';
