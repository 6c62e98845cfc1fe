export const COOKIE_NAME = "app_session_id";
export const ONE_YEAR_MS = 1000 * 60 * 60 * 24 * 365;

/** URL prefix the local upload directory is served under. */
export const UPLOAD_URL_PREFIX = "/static/uploads";

/** Subdirectory (local) and key prefix (remote) that holds registrant photos. */
export const PHOTOS_SUBDIR = "photos";

/** Bundled demo photos, under the upload directory and as a key prefix. */
export const SAMPLE_PHOTOS_SUBDIR = "sample_photos";
