import { MemoryClientsRepository } from "../src/infra/memory/memoryClientsRepo";
import { MemoryPersonsRepository } from "../src/infra/memory/memoryPersonsRepo";
import { ClientsService } from "../src/modules/clients/service";
import { PersonsService } from "../src/modules/persons/service";

const personFields = {
  name: "Jose Lema",
  gender: "M",
  age: 35,
  identification: "1712345678",
  address: "Otavalo sn y principal",
  phone: "098254785"
};

describe("ClientsService", () => {
  test("a failed password hash leaves no person behind", async () => {
    const persons = new PersonsService(new MemoryPersonsRepository());
    const clientsRepo = new MemoryClientsRepository();
    const service = new ClientsService(clientsRepo, persons, {
      hash: async () => {
        throw new Error("hashing failed");
      }
    });

    await expect(
      service.createClient({ ...personFields, password: "test-secret" })
    ).rejects.toThrow("hashing failed");
    await expect(persons.listPersons()).resolves.toEqual([]);
    await expect(clientsRepo.list()).resolves.toEqual([]);
  });

  test("a failed password hash on update leaves the person unchanged", async () => {
    const persons = new PersonsService(new MemoryPersonsRepository());
    let failing = false;
    const service = new ClientsService(new MemoryClientsRepository(), persons, {
      hash: async (plain) => {
        if (failing) {
          throw new Error("hashing failed");
        }
        return `hashed:${plain}`;
      }
    });
    const created = await service.createClient({ ...personFields, password: "test-secret" });

    failing = true;
    await expect(
      service.updateClient(created.clientId, {
        ...personFields,
        address: "13 junio y Equinoccial",
        password: "test-secret-2",
        status: false
      })
    ).rejects.toThrow("hashing failed");

    const person = await persons.getPerson(created.personId);
    expect(person.address).toBe("Otavalo sn y principal");
  });
});
