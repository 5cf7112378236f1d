/**
 * Source registry.
 *
 * New providers are added here; the runner only ever sees the `DataSource`
 * interface.
 */
import { HttpClient } from '../net/httpClient';
import { envCredentials } from '../credentials';
import type { CredentialProvider, SourceKind, SourceRegistry } from '../types';
import { AlienVault } from './alienvault';
import { AnubisDb } from './anubisdb';
import { C99 } from './c99';
import { CertSpotter } from './certspotter';
import { CrtSh } from './crtsh';
import { HackerTarget } from './hackertarget';
import { RapidDns } from './rapiddns';
import { SecurityTrails } from './securitytrails';
import { ThreatCrowd } from './threatcrowd';
import { ThreatMiner } from './threatminer';
import { UrlScan } from './urlscan';
import { Wayback } from './wayback';

export function createRegistry(
  client: HttpClient = new HttpClient(),
  credentials: CredentialProvider = envCredentials,
): SourceRegistry {
  return {
    free: [
      new AlienVault(client),
      new AnubisDb(client),
      new CertSpotter(client),
      new CrtSh(client),
      new HackerTarget(client),
      new RapidDns(client),
      new ThreatCrowd(client),
      new ThreatMiner(client),
      new UrlScan(client),
      new Wayback(client),
    ],
    keyed: [new C99(client, credentials), new SecurityTrails(client, credentials)],
  };
}

export function listSources(registry: SourceRegistry): Array<{ name: string; kind: SourceKind }> {
  return [
    ...registry.free.map((s) => ({ name: s.name, kind: 'free' as const })),
    ...registry.keyed.map((s) => ({ name: s.name, kind: 'keyed' as const })),
  ];
}

export { fetchSource, toBatch } from './fetchSource';
