import { injectable } from 'inversify';
import { ICloudLinkResolver } from '../interfaces';
import { hostMatches, parseUrl } from './urlNormalizer';

type Rewrite = (url: URL, raw: string) => string | null;

const DRIVE_FILE_PATH = /\/file\/d\/([a-zA-Z0-9_-]+)/;
const DROPBOX_SHARE_PATH = /^\/(s|sh|scl\/fi)\//;

function appendParam(raw: string, param: string): string {
  const separator = raw.includes('?') ? '&' : '?';
  return `${raw}${separator}${param}`;
}

const googleDrive: Rewrite = (url, raw) => {
  if (!hostMatches(url.hostname, 'drive.google.com')) return null;

  let fileId = DRIVE_FILE_PATH.exec(url.pathname)?.[1] ?? null;
  if (!fileId && (raw.includes('open?id=') || raw.includes('uc?id='))) {
    fileId = url.searchParams.get('id');
  }
  if (!fileId) return null;

  const resourceKey = url.searchParams.get('resourcekey');
  const direct = `https://drive.google.com/uc?export=download&id=${encodeURIComponent(fileId)}`;
  return resourceKey ? `${direct}&resourcekey=${encodeURIComponent(resourceKey)}` : direct;
};

const dropbox: Rewrite = (url, raw) => {
  if (!hostMatches(url.hostname, 'dropbox.com') || !DROPBOX_SHARE_PATH.test(url.pathname)) return null;

  if (/[?&]dl=0(?=&|$)/.test(raw)) {
    return raw.replace(/([?&])dl=0(?=&|$)/, '$1dl=1');
  }
  if (url.searchParams.has('dl')) return null;
  return appendParam(raw, 'dl=1');
};

const oneDrive: Rewrite = (url, raw) => {
  const host = url.hostname;
  // 1drv.ms short links are left to the redirect that follows them
  if (hostMatches(host, '1drv.ms')) return null;

  if (hostMatches(host, 'onedrive.live.com')) {
    if (raw.includes('redir?resid=')) {
      return url.searchParams.has('download') ? null : appendParam(raw, 'download=1');
    }
    if (raw.includes('view.aspx')) return raw.replace('view.aspx', 'download.aspx');
    return null;
  }

  if (hostMatches(host, 'sharepoint.com')) {
    return url.searchParams.get('download') === '1' ? null : appendParam(raw, 'download=1');
  }
  return null;
};

/**
 * Best-effort rewrite of share and viewer links into direct-download URLs.
 * Pure string work; any URL it does not recognise comes back unchanged.
 */
@injectable()
export class CloudLinkResolver implements ICloudLinkResolver {
  private readonly rewrites: readonly Rewrite[] = [googleDrive, dropbox, oneDrive];

  resolve(url: string): string {
    const parsed = parseUrl(url);
    if (!parsed) return url;

    for (const rewrite of this.rewrites) {
      try {
        const rewritten = rewrite(parsed, url);
        if (rewritten) return rewritten;
      } catch {
        return url;
      }
    }
    return url;
  }
}
