/**
 * Supplies the `Authorization` header of every request
 */
export interface SolrAuth {
  authorizationHeader(): string;
}

/**
 * HTTP basic authentication (Solr's BasicAuthPlugin)
 */
export class BasicAuth implements SolrAuth {
  constructor(
    private readonly username: string,
    private readonly password: string,
  ) {}

  authorizationHeader(): string {
    const credentials = Buffer.from(`${this.username}:${this.password}`).toString('base64');
    return `Basic ${credentials}`;
  }
}

/**
 * Bearer token authentication (e.g. Solr's JWTAuthPlugin)
 */
export class BearerAuth implements SolrAuth {
  constructor(private readonly token: string) {}

  authorizationHeader(): string {
    return `Bearer ${this.token}`;
  }
}
