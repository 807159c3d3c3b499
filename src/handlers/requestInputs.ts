import { Request } from 'express';
import { CountryBody, PersonBody } from '../api/middleware/validation.middleware.js';
import { UploadField, uploadedFile } from '../api/middleware/upload.middleware.js';
import { CountryInput } from '../services/audit/country.auditor.js';
import { PersonInput } from '../services/audit/person.auditor.js';
import { sniffUpload } from '../services/files/fileFormat.service.js';
import { UploadedFile } from '../types/index.js';

export async function sniffedUpload(
  req: Request,
  field: UploadField
): Promise<UploadedFile | undefined> {
  const file = uploadedFile(req, field);
  return file ? sniffUpload(file.originalname, file.buffer) : undefined;
}

export function countryInputFromBody(body: CountryBody, flag?: UploadedFile): CountryInput {
  return {
    code: body.code,
    name: body.name,
    isStaff: body.isStaff,
    participantsOk: body.participantsOk,
    contactEmail: body.contactEmail,
    contactExtra: body.contactExtra,
    expected: {
      leaders: body.expectedLeaders,
      deputies: body.expectedDeputies,
      contestants: body.expectedContestants,
      observersA: body.expectedObserversA,
      observersB: body.expectedObserversB,
      observersC: body.expectedObserversC,
      singleRooms: body.expectedSingleRooms,
    },
    genericUrl: body.genericUrl,
    leaderEmail: body.leaderEmail,
    physicalAddress: body.physicalAddress,
    flag,
  };
}

export function personInputFromBody(
  body: PersonBody,
  photo?: UploadedFile,
  consentForm?: UploadedFile
): PersonInput {
  return {
    countryId: body.countryId,
    givenName: body.givenName,
    familyName: body.familyName,
    passportGivenName: body.passportGivenName,
    passportFamilyName: body.passportFamilyName,
    gender: body.gender,
    primaryRole: body.primaryRole,
    otherRoles: body.otherRoles,
    guideFor: body.guideFor,
    dobYear: body.dobYear,
    dobMonth: body.dobMonth,
    dobDay: body.dobDay,
    languages: body.languages,
    diet: body.diet,
    tshirt: body.tshirt,
    arrival: {
      place: body.arrivalPlace,
      date: body.arrivalDate,
      hour: body.arrivalHour,
      minute: body.arrivalMinute,
      flight: body.arrivalFlight,
    },
    departure: {
      place: body.departurePlace,
      date: body.departureDate,
      hour: body.departureHour,
      minute: body.departureMinute,
      flight: body.departureFlight,
    },
    roomType: body.roomType,
    roomShareWith: body.roomShareWith,
    roomNumber: body.roomNumber,
    phoneNumber: body.phoneNumber,
    passportNumber: body.passportNumber,
    nationality: body.nationality,
    incomplete: body.incomplete,
    genericUrl: body.genericUrl,
    reusePhoto: body.reusePhoto,
    eventPhotosConsent: body.eventPhotosConsent,
    photoConsent: body.photoConsent,
    dietConsent: body.dietConsent,
    photo,
    consentForm,
  };
}
