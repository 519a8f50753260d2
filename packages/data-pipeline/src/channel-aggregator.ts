import type { ChannelDimensionRow } from '@medwarehouse/core';
import {
  classifyActivityLevel,
  classifyChannelType,
  percentage,
  resolveChannelDisplayName,
  roundTo2,
} from './rules.ts';
import { channelKey } from './surrogate-key.ts';
import type { StagingMessage } from './types.ts';

const DAY_MS = 86_400_000;

export function compareText(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

function compareMessages(left: StagingMessage, right: StagingMessage): number {
  return compareText(left.messageDate, right.messageDate) || left.messageId - right.messageId;
}

/** Inclusive count of days between the first and last post. */
export function computeDaysActive(firstPostDate: string, lastPostDate: string): number {
  const spanMs = Date.parse(lastPostDate) - Date.parse(firstPostDate);
  return Math.floor(spanMs / DAY_MS) + 1;
}

export function computeEngagementRate(avgViews: number, avgForwards: number, totalPosts: number): number {
  if (totalPosts <= 0) {
    return 0;
  }
  return roundTo2(((avgViews + avgForwards) / totalPosts) * 100);
}

function aggregateChannel(channelName: string, messages: readonly StagingMessage[]): ChannelDimensionRow | null {
  const ordered = [...messages].sort(compareMessages);
  const first = ordered[0];
  const last = ordered[ordered.length - 1];
  if (!first || !last) {
    return null;
  }

  let viewsTotal = 0;
  let forwardsTotal = 0;
  let lengthTotal = 0;
  let mediaPosts = 0;
  for (const message of ordered) {
    viewsTotal += message.views;
    forwardsTotal += message.forwards;
    lengthTotal += message.messageLength;
    if (message.hasMedia) {
      mediaPosts += 1;
    }
  }

  const totalPosts = ordered.length;
  const avgViews = viewsTotal / totalPosts;
  const avgForwards = forwardsTotal / totalPosts;
  const daysActive = computeDaysActive(first.messageDate, last.messageDate);

  return {
    channelKey: channelKey(channelName),
    channelName,
    channelDisplayName: resolveChannelDisplayName(channelName),
    channelType: classifyChannelType(channelName),
    totalPosts,
    firstPostDate: first.messageDate,
    lastPostDate: last.messageDate,
    avgViews,
    avgForwards,
    totalMediaPosts: mediaPosts,
    avgMessageLength: lengthTotal / totalPosts,
    mediaPercentage: percentage(mediaPosts, totalPosts),
    engagementRate: computeEngagementRate(avgViews, avgForwards, totalPosts),
    daysActive,
    postsPerDay: daysActive > 0 ? roundTo2(totalPosts / daysActive) : 0,
    activityLevel: classifyActivityLevel(totalPosts),
  };
}

/** One row per distinct normalized channel name, ordered by name. */
export function aggregateChannels(messages: readonly StagingMessage[]): ChannelDimensionRow[] {
  const byChannel = new Map<string, StagingMessage[]>();
  for (const message of messages) {
    const group = byChannel.get(message.channelName);
    if (group) {
      group.push(message);
    } else {
      byChannel.set(message.channelName, [message]);
    }
  }

  const channels: ChannelDimensionRow[] = [];
  for (const channelName of [...byChannel.keys()].sort(compareText)) {
    const row = aggregateChannel(channelName, byChannel.get(channelName) ?? []);
    if (row) {
      channels.push(row);
    }
  }
  return channels;
}
