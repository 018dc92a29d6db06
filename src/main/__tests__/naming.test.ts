import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { parseDateToken } from '../utils/date.js';
import {
  aliasKey,
  artifactIdFromRemoteKey,
  artifactSubject,
  compareFrames,
  dailyKey,
  localArtifactPath,
  parseArtifactId,
  remoteArtifactKey,
  remoteKindPrefix,
  weeklyKey
} from '../utils/naming.js';

describe('artifact keys', () => {
  it('derives daily and weekly ids', () => {
    expect(dailyKey('TLST04A00879_250720070000')).toEqual({ kind: 'daily', id: 'daily/TLST04A00879_250720070000' });
    expect(weeklyKey(parseDateToken('250714'))).toEqual({ kind: 'weekly', id: 'weekly/250714' });
  });

  it('maps keys to both tiers', () => {
    const key = weeklyKey(parseDateToken('250707'));
    expect(localArtifactPath('/data/videos', key)).toBe(path.join('/data/videos', 'weekly', '250707.mp4'));
    expect(remoteArtifactKey('timelapse', key)).toBe('timelapse/weekly/250707.mp4');
    expect(remoteArtifactKey('', key)).toBe('weekly/250707.mp4');
    expect(remoteKindPrefix('timelapse', 'daily')).toBe('timelapse/daily/');
    expect(aliasKey('timelapse', 'latest')).toBe('timelapse/latest.jpg');
  });

  it('reads ids back from remote listings', () => {
    expect(artifactIdFromRemoteKey('timelapse', 'timelapse/daily/TLST04A00879_250720070000.mp4')).toBe(
      'daily/TLST04A00879_250720070000'
    );
    expect(artifactIdFromRemoteKey('timelapse', 'timelapse/week.mp4')).toBeUndefined();
    expect(artifactIdFromRemoteKey('timelapse', 'other/daily/x.mp4')).toBeUndefined();
    expect(artifactIdFromRemoteKey('timelapse', 'timelapse/weekly/2507.mp4')).toBeUndefined();
  });

  it('parses only well-formed ids', () => {
    expect(parseArtifactId('weekly/250714')).toEqual({ kind: 'weekly', id: 'weekly/250714' });
    expect(parseArtifactId('monthly/2507')).toBeUndefined();
    expect(parseArtifactId('daily/')).toBeUndefined();
    expect(parseArtifactId('daily/a/b')).toBeUndefined();
    expect(artifactSubject({ kind: 'daily', id: 'daily/cam_250714' })).toBe('cam_250714');
  });
});

describe('compareFrames', () => {
  it('orders by sequence number, not by text', () => {
    const names = ['TLS_10.jpg', 'TLS_2.jpg', 'TLS_1.jpg', 'TLS_0003 (1).jpg', 'cover.jpg'];
    expect([...names].sort(compareFrames)).toEqual(['cover.jpg', 'TLS_1.jpg', 'TLS_2.jpg', 'TLS_0003 (1).jpg', 'TLS_10.jpg']);
  });
});
