/**
 * A chat that receives notifications, for one target or globally
 */
export interface Subscription {
  id: number;
  chatId: string;
  /** null for a global subscriber */
  targetId: number | null;
  muted: boolean;
  anomalyNotifications: boolean;
  createdAt: Date;
}

export interface SubscriptionInput {
  chatId: string;
  targetId: number | null;
  muted: boolean;
  anomalyNotifications: boolean;
}

export type NotificationKind = 'down' | 'recovered' | 'reminder' | 'anomaly' | 'digest';
