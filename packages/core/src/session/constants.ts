// Header names are part of the wire contract with the backend

export const AUTHORIZATION_HEADER = 'Authorization';
export const TRACKING_ID_HEADER = 'x-wl-analytics-tracking-id';
export const ANALYTICS_METADATA_HEADER = 'x-mfp-analytics-metadata';
export const WWW_AUTHENTICATE_HEADER = 'WWW-Authenticate';
