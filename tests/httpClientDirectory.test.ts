import { UpstreamServiceError } from "../src/common/errors";
import { HttpClientDirectory } from "../src/infra/http/httpClientDirectory";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" }
  });
}

describe("HttpClientDirectory", () => {
  test("fetches the client by id and keeps its name", async () => {
    const fetchImpl = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
    fetchImpl.mockResolvedValue(
      jsonResponse({ clientId: 4, name: "Jose Lema", status: true, address: "ignored" })
    );
    const directory = new HttpClientDirectory("http://clients.test/", 1000, undefined, fetchImpl);

    await expect(directory.getClientById(4)).resolves.toEqual({ clientId: 4, name: "Jose Lema" });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][0]).toBe("http://clients.test/clients/4");
  });

  test("a 404 means the client does not exist", async () => {
    const fetchImpl = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
    fetchImpl.mockResolvedValue(jsonResponse({ message: "not found" }, 404));
    const directory = new HttpClientDirectory("http://clients.test", 1000, undefined, fetchImpl);

    await expect(directory.getClientById(4)).resolves.toBeNull();
  });

  test("other error statuses surface as upstream errors", async () => {
    const fetchImpl = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
    fetchImpl.mockResolvedValue(jsonResponse({}, 503));
    const directory = new HttpClientDirectory("http://clients.test", 1000, undefined, fetchImpl);

    await expect(directory.getClientById(4)).rejects.toThrow(
      new UpstreamServiceError("Clients API responded with 503")
    );
  });

  test("network failures surface as upstream errors", async () => {
    const fetchImpl = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
    fetchImpl.mockRejectedValue(new TypeError("fetch failed"));
    const directory = new HttpClientDirectory("http://clients.test", 1000, undefined, fetchImpl);

    await expect(directory.getClientById(4)).rejects.toThrow(
      new UpstreamServiceError("Clients API is unreachable")
    );
  });

  test("a body that is not JSON surfaces as an upstream error", async () => {
    const fetchImpl = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
    fetchImpl.mockResolvedValue(new Response("<html>oops</html>", { status: 200 }));
    const directory = new HttpClientDirectory("http://clients.test", 1000, undefined, fetchImpl);

    await expect(directory.getClientById(1)).rejects.toThrow(
      new UpstreamServiceError("Clients API returned an unreadable body")
    );
  });

  test("payloads without a name are rejected", async () => {
    const fetchImpl = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
    fetchImpl.mockResolvedValue(jsonResponse({ clientId: 4 }));
    const directory = new HttpClientDirectory("http://clients.test", 1000, undefined, fetchImpl);

    await expect(directory.getClientById(4)).rejects.toBeInstanceOf(UpstreamServiceError);
  });
});
