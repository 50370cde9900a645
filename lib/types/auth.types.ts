/**
 * Type Definitions for Auth Component Detection
 */

export type ComponentKind =
  | 'LoginForm'
  | 'AuthContainer'
  | 'PasswordInput'
  | 'AuthForm'
  | 'AuthSection'
  | 'OAuthButton'
  | 'AuthLink';

export const COMPONENT_LABELS: Readonly<Record<ComponentKind, string>> = {
  LoginForm: 'Login Form (contains password field)',
  AuthContainer: 'Auth Container (div-based)',
  PasswordInput: 'Password Input Field',
  AuthForm: 'Authentication Form',
  AuthSection: 'Auth Section / Container',
  OAuthButton: 'OAuth / SSO Button',
  AuthLink: 'Auth Link / Button',
};

export interface DetectedComponent {
  readonly kind: ComponentKind;
  readonly snippet: string;
  readonly context: string;
}

/**
 * A rule match before truncation and dedup.
 * `markup` is the serialized, trimmed outer HTML of the anchor node.
 */
export interface Candidate {
  readonly kind: ComponentKind;
  readonly markup: string;
  readonly context: string;
}

export interface DetectionResult {
  readonly found: boolean;
  readonly components: readonly DetectedComponent[];
  readonly summary: string;
  readonly totalFound: number;
}

export type ScanError =
  | { readonly kind: 'Timeout'; readonly message: string }
  | { readonly kind: 'ConnectionFailure'; readonly message: string }
  | { readonly kind: 'HttpError'; readonly statusCode: number; readonly message: string }
  | { readonly kind: 'Other'; readonly message: string };

export type ScanErrorKind = ScanError['kind'];

export interface ScanResult {
  readonly url: string;
  readonly success: boolean;
  readonly error: ScanError | null;
  readonly statusCode: number | null;
  readonly pageTitle: string | null;
  readonly authResult: DetectionResult | null;
  readonly scanDurationSeconds: number;
}

export interface BatchScanResult {
  readonly results: readonly ScanResult[];
  readonly totalScanned: number;
  readonly sitesWithAuthFound: number;
}

/**
 * Keyword configuration handed to every rule.
 * Keywords are matched lower-cased as substrings.
 */
export interface DetectionKeywords {
  readonly authKeywords: readonly string[];
  readonly authInputNames: readonly string[];
  readonly containerKeywords: readonly string[];
  readonly oauthTextPattern: RegExp;
  readonly authHrefPatterns: readonly string[];
  readonly authLinkTexts: readonly string[];
}
