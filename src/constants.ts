export const CREDENTIALS_DIR = '.aws';
export const CREDENTIALS_FILE = 'credentials';

export const CREDENTIALS_FILE_MODE = 0o600; // Owner read/write only (rw-------)

// Keys recognized inside a profile section
export const ACCESS_KEY_ID_KEY = 'aws_access_key_id';
export const SECRET_ACCESS_KEY_KEY = 'aws_secret_access_key';
export const SESSION_TOKEN_KEY = 'aws_session_token';
