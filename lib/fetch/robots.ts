type Rule = { allow: boolean; path: string };

export type RobotsRules = {
  rules: Rule[];
};

export const ALLOW_ALL: RobotsRules = { rules: [] };

/**
 * Parses the `User-agent: *` group(s) of a robots.txt. Other agents' groups
 * are ignored.
 */
export function parseRobots(text: string): RobotsRules {
  const rules: Rule[] = [];
  let groupAgents: string[] = [];
  let inRules = false;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) continue;
    const sep = line.indexOf(':');
    if (sep === -1) continue;
    const field = line.slice(0, sep).trim().toLowerCase();
    const value = line.slice(sep + 1).trim();

    if (field === 'user-agent') {
      if (inRules) {
        groupAgents = [];
        inRules = false;
      }
      groupAgents.push(value.toLowerCase());
      continue;
    }
    if (field !== 'allow' && field !== 'disallow') continue;
    inRules = true;
    if (!groupAgents.includes('*')) continue;
    // An empty Disallow means "allow everything".
    if (!value) continue;
    rules.push({ allow: field === 'allow', path: value });
  }
  return { rules };
}

function ruleMatches(rulePath: string, target: string) {
  const anchored = rulePath.endsWith('$');
  const body = anchored ? rulePath.slice(0, -1) : rulePath;
  const pattern = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${pattern}${anchored ? '$' : ''}`).test(target);
}

/** Longest matching rule wins; Allow wins a tie. */
export function isPathAllowed(robots: RobotsRules, url: string) {
  let target: string;
  try {
    const u = new URL(url);
    target = `${u.pathname}${u.search}`;
  } catch {
    return false;
  }
  let best: Rule | null = null;
  for (const rule of robots.rules) {
    if (!ruleMatches(rule.path, target)) continue;
    if (!best || rule.path.length > best.path.length || (rule.path.length === best.path.length && rule.allow)) {
      best = rule;
    }
  }
  return best ? best.allow : true;
}
