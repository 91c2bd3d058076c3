/**
 * @file src/lib/wiki-url.ts
 * @description Translates ONES wiki page URLs into the backend API endpoints serving their content.
 *
 * @example
 *   translateWikiUrl('https://ones.example.com/wiki/#/team/T1/space/S1/page/P1')
 *   // => { ok: true, value: { host: 'ones.example.com', teamId: 'T1', pageId: 'P1' } }
 */

import { err, ok, type Result, WikiError } from './errors';

export interface WikiReference {
  readonly host: string;
  readonly teamId: string;
  readonly pageId: string;
}

export type EndpointLabel = 'primary' | 'alternative';

export interface WikiEndpoint {
  label: EndpointLabel;
  url: string;
}

// The space segment has to be present but the API does not need it.
const WIKI_URL_PATTERN = /^https:\/\/([^/]+)\/wiki\/#\/team\/([^/]+)\/space\/([^/]+)\/page\/([^/]+)$/;

export const INVALID_WIKI_URL_MESSAGE = 'Invalid wiki URL format';

export const translateWikiUrl = (wikiUrl: string): Result<WikiReference> => {
  const match = WIKI_URL_PATTERN.exec(wikiUrl.trim());
  if (!match) {
    return err(new WikiError('InvalidFormat', INVALID_WIKI_URL_MESSAGE));
  }
  const [, host, teamId, , pageId] = match;
  return ok(Object.freeze({ host, teamId, pageId }));
};

export const buildPrimaryEndpoint = (ref: WikiReference): string =>
  `https://${ref.host}/wiki/api/wiki/team/${ref.teamId}/online_page/${ref.pageId}/content`;

export const buildAlternativeEndpoint = (ref: WikiReference): string =>
  `https://${ref.host}/wiki/api/wiki/team/${ref.teamId}/page/${ref.pageId}`;

export const buildCandidateEndpoints = (ref: WikiReference): WikiEndpoint[] => [
  { label: 'primary', url: buildPrimaryEndpoint(ref) },
  { label: 'alternative', url: buildAlternativeEndpoint(ref) },
];
