// node/src/utils/http.ts
import type { AxiosInstance } from 'axios';

/** The slice of an axios instance the HTTP collaborators use; lets tests pass a fake. */
export type HttpPoster = Pick<AxiosInstance, 'post'>;
