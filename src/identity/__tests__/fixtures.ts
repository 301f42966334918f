/**
 * Builders for externalIdentities query responses.
 */
export function identityEdge(login: string, nameId: string) {
  return {
    node: {
      guid: `guid-${login}`,
      samlIdentity: { nameId },
      user: { login },
    },
  };
}

export function identitiesResponse(
  edges: Array<ReturnType<typeof identityEdge>>,
) {
  return {
    data: {
      organization: {
        samlIdentityProvider: {
          ssoUrl: "https://idp.example.test/sso",
          externalIdentities: { edges },
        },
      },
    },
  };
}

export function createLoggerStub() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}
