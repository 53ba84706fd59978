import type { NextjsOptions } from 'convex/nextjs';

export interface ConvexConnection {
  url: string;
  token: string;
  scheme: string;
}

export type ConvexRequestOptions = NextjsOptions & { adminToken?: string };

/**
 * Reads the Convex deployment URL and key from the environment. A deployment
 * key wins over an admin key; `CONVEX_AUTH_SCHEME` overrides the inferred
 * scheme.
 */
export function resolveConvexConnection(env: Partial<NodeJS.ProcessEnv> = process.env): ConvexConnection | null {
  const url = env.CONVEX_URL?.trim();
  const deploymentKey = env.CONVEX_DEPLOYMENT_KEY?.trim();
  const token = deploymentKey || env.CONVEX_ADMIN_KEY?.trim();
  if (!url || !token) {
    return null;
  }

  const scheme = env.CONVEX_AUTH_SCHEME?.trim() || (deploymentKey ? 'Deployment' : 'Admin');
  return { url, token, scheme };
}

function canonicaliseDeploymentUrl(url: string): string {
  const trimmed = url.trim();
  try {
    const parsed = new URL(trimmed);
    if (parsed.hostname.endsWith('.convex.site')) {
      parsed.hostname = parsed.hostname.replace(/\.convex\.site$/, '.convex.cloud');
    }
    return parsed.toString().replace(/\/+$/, '');
  } catch {
    return trimmed.replace(/\.convex\.site(?=[/?#]|$)/, '.convex.cloud').replace(/\/+$/, '');
  }
}

// Bearer/User tokens are end-user JWTs; every other scheme carries a deployment or admin key.
const USER_TOKEN_SCHEMES = new Set(['bearer', 'user']);

export function buildConvexClientOptions(connection: ConvexConnection): ConvexRequestOptions {
  const options: ConvexRequestOptions = {
    url: canonicaliseDeploymentUrl(connection.url),
    skipConvexDeploymentUrlCheck: true,
  };

  if (USER_TOKEN_SCHEMES.has(connection.scheme.trim().toLowerCase())) {
    options.token = connection.token;
  } else {
    options.adminToken = connection.token;
  }
  return options;
}
