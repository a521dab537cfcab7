// Auth DTOs
export * from './login.dto';
export * from './auth-response.dto';

// Analyzer DTOs
export * from './update-extraction-prompt.dto';
